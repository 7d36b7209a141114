/**
 * JSON Schema object describing a tool's parameters, as advertised by the
 * remote endpoint. Kept as received; it is handed to the model unchanged.
 */
export type ParameterSchema = Readonly<Record<string, unknown>>;

export interface InvocationOptions {
    /** Cancels the remote call when aborted. */
    signal?: AbortSignal;
}

/**
 * Metadata for one callable remote operation.
 * Identity is the name, which is unique within one listing.
 */
export interface ToolDescriptor {
    readonly name: string;
    /** Empty when the remote endpoint advertises no description. */
    readonly description: string;
    readonly parameterSchema: ParameterSchema;
}

/**
 * A descriptor bound to the connection that can invoke it.
 * The reasoning loop dispatches through this interface by tool name.
 */
export interface RemoteTool extends ToolDescriptor {
    /**
     * Invokes the remote operation and returns its textual result.
     * Rejects with a ToolInvocationError when the remote side reports a failure.
     */
    invoke(args: Record<string, unknown>, options?: InvocationOptions): Promise<string>;
}

/**
 * Lists the tools the remote endpoint currently exposes.
 */
export interface ToolDirectory {
    listTools(): Promise<RemoteTool[]>;
    close(): Promise<void>;
}
