/**
 * Error taxonomy of the design standards agent. Every failure that leaves a
 * component is one of these, with the underlying error kept as `cause`.
 */

export type ErrorKind =
    | 'configuration'
    | 'connection'
    | 'protocol'
    | 'invalid_argument'
    | 'agent'
    | 'tool_invocation';

export abstract class DesignAgentError extends Error {
    public abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** A required setting is missing or invalid. Fatal at startup. */
export class ConfigurationError extends DesignAgentError {
    public readonly kind = 'configuration';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/** The remote endpoint is unreachable, timed out, or rejected our credentials. */
export class ConnectionError extends DesignAgentError {
    public readonly kind = 'connection';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConnectionError';
    }
}

/** The remote endpoint answered, but not with something we can use. */
export class ProtocolError extends DesignAgentError {
    public readonly kind = 'protocol';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ProtocolError';
    }
}

/** The caller passed an unusable value, such as a blank topic. */
export class InvalidArgumentError extends DesignAgentError {
    public readonly kind = 'invalid_argument';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InvalidArgumentError';
    }
}

/** The reasoning loop failed, timed out, or produced no answer. */
export class AgentError extends DesignAgentError {
    public readonly kind = 'agent';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AgentError';
    }
}

/** A remote tool ran but reported a failure in its result. */
export class ToolInvocationError extends DesignAgentError {
    public readonly kind = 'tool_invocation';

    constructor(
        public readonly toolName: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'ToolInvocationError';
    }
}
