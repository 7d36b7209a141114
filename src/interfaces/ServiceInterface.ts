/**
 * A transport the service operations are offered on.
 */
export interface ServiceInterface {
    start(): Promise<void>;
    stop(): Promise<void>;
}
