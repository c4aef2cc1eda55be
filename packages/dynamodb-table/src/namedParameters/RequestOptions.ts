export interface RequestOptions {
    /**
     * A signal that aborts the request sent to DynamoDB when triggered. The
     * operation's promise then rejects with the client's abort error.
     */
    abortSignal?: AbortSignal;
}
