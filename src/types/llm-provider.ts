/**
 * Interface for chat-completion providers.
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Whether the provider has an endpoint and key */
    isConfigured(): boolean;

    /**
     * Send a single-turn completion request.
     * @returns The assistant message text
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Maximum tokens in response */
    maxTokens?: number;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    text: string;
    model: string;
    provider: string;
}
