export type ServerConfiguration = {
    host: string;
    port: number;
};

/**
 * Server port - exposes the read API over HTTP
 */
export interface ServerPort {
    /**
     * Issue a request against the application without opening a socket
     */
    request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response>;

    start(config: ServerConfiguration): Promise<void>;

    stop(): Promise<void>;
}
