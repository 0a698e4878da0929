/**
 * OpenRouter API Client
 * Chat completions with function calling, used as the reasoning engine of the research agent
 */

import { z } from 'zod';
import { envTimeoutMs } from '../utils/env.js';

const OPENROUTER_API_BASE = 'https://openrouter.ai/api/v1';
const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;
const DEFAULT_CHAT_TIMEOUT_MS = 300_000;

function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort();
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

export interface ToolCall {
    id: string;
    name: string;
    /** Raw JSON string exactly as the model produced it. */
    arguments: string;
}

export type Message =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
    | { role: 'tool'; content: string; toolCallId: string };

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: {
        type: 'object';
        properties: Record<string, { type: string; description?: string }>;
        required?: string[];
    };
}

export interface ChatOptions {
    temperature?: number;
    maxTokens?: number;
    tools?: ToolDefinition[];
    toolChoice?: 'auto' | 'none';
    signal?: AbortSignal;
}

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string;
            toolCalls: ToolCall[];
        };
        finishReason: string;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

const ToolCallSchema = z.object({
    id: z.string(),
    type: z.string().optional(),
    function: z.object({
        name: z.string(),
        arguments: z.string().nullish(),
    }),
});

const ChatCompletionSchema = z.object({
    id: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({
            role: z.string().optional(),
            content: z.string().nullish(),
            tool_calls: z.array(ToolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
    })),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
    }).nullish(),
});

const ErrorBodySchema = z.object({
    message: z.string().optional(),
    error: z.union([z.string(), z.object({ message: z.string().optional() })]).optional(),
});

function toWireMessage(message: Message): Record<string, unknown> {
    switch (message.role) {
        case 'assistant':
            return {
                role: 'assistant',
                content: message.content,
                ...(message.toolCalls && message.toolCalls.length > 0
                    ? {
                        tool_calls: message.toolCalls.map((call) => ({
                            id: call.id,
                            type: 'function',
                            function: { name: call.name, arguments: call.arguments },
                        })),
                    }
                    : {}),
            };
        case 'tool':
            return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
        default:
            return { role: message.role, content: message.content };
    }
}

export class OpenRouterClient {
    private apiKey: string;

    constructor(apiKey: string) {
        if (!apiKey || apiKey.trim() === '') {
            throw new Error(
                'OPENROUTER_API_KEY is required.\n' +
                'Get your API key at: https://openrouter.ai\n' +
                'Then run: founders init'
            );
        }
        this.apiKey = apiKey.trim();
    }

    /**
     * Fetch with retry logic and exponential backoff
     */
    private async fetchWithRetry(
        url: string,
        options: RequestInit,
        retries = MAX_RETRIES,
        timeoutMs: number = DEFAULT_CHAT_TIMEOUT_MS
    ): Promise<Response> {
        let lastError: Error | null = null;
        let lastResponse: Response | null = null;

        for (let attempt = 0; attempt < retries; attempt++) {
            const resolvedTimeoutMs = envTimeoutMs(process.env.OPENROUTER_TIMEOUT_MS, timeoutMs);
            const { signal, cleanup } = createTimeoutSignal(resolvedTimeoutMs, options.signal ?? undefined);
            try {
                const response = await fetch(url, { ...options, signal });
                lastResponse = response;

                // Don't retry client errors (4xx except 429), only server errors (5xx) and rate limits
                if (response.ok || (response.status >= 400 && response.status < 500 && response.status !== 429)) {
                    return response;
                }

                const delay = response.status === 429
                    ? INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt + 1)
                    : INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                if (attempt < retries - 1) {
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            } catch (error) {
                const err = toError(error);
                lastError = isAbortError(err)
                    ? new Error(`Request timed out after ${resolvedTimeoutMs}ms`)
                    : err;

                if (attempt < retries - 1) {
                    const delay = INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            } finally {
                cleanup();
            }
        }

        if (lastResponse) return lastResponse;
        throw lastError || new Error('Max retries exceeded');
    }

    /**
     * Parse API error response for better error messages
     */
    private async parseError(response: Response): Promise<string> {
        try {
            const text = await response.text();
            try {
                const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
                if (!parsed.success) return text;
                const { error, message } = parsed.data;
                if (typeof error === 'string') return error;
                return error?.message || message || text;
            } catch {
                return text;
            }
        } catch {
            return `HTTP ${response.status}`;
        }
    }

    /**
     * Send a chat completion request (non-streaming), optionally offering tools
     */
    async chat(
        model: string,
        messages: Message[],
        options: ChatOptions = {}
    ): Promise<ChatResponse> {
        const body: Record<string, unknown> = {
            model,
            messages: messages.map(toWireMessage),
            stream: false,
        };
        if (typeof options.temperature === 'number') body.temperature = options.temperature;
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;
        if (options.tools && options.tools.length > 0) {
            body.tools = options.tools.map((tool) => ({
                type: 'function',
                function: {
                    name: tool.name,
                    description: tool.description,
                    parameters: tool.parameters,
                },
            }));
            body.tool_choice = options.toolChoice ?? 'auto';
        }

        const response = await this.fetchWithRetry(`${OPENROUTER_API_BASE}/chat/completions`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${this.apiKey}`,
                'X-Title': 'Founder Finder',
            },
            body: JSON.stringify(body),
            signal: options.signal,
        }, MAX_RETRIES, DEFAULT_CHAT_TIMEOUT_MS);

        if (!response.ok) {
            const errorMessage = await this.parseError(response);

            if (response.status === 401) {
                throw new Error(
                    'OpenRouter API authentication failed.\n' +
                    'Please check your OPENROUTER_API_KEY is valid.\n' +
                    'Run: founders init'
                );
            }

            throw new Error(`OpenRouter API error: ${response.status} - ${errorMessage}`);
        }

        const parsed = ChatCompletionSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error(`OpenRouter API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }

        const data = parsed.data;
        return {
            id: data.id ?? '',
            choices: data.choices.map((choice) => ({
                message: {
                    role: choice.message.role ?? 'assistant',
                    content: choice.message.content ?? '',
                    toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
                        id: call.id,
                        name: call.function.name,
                        arguments: call.function.arguments ?? '',
                    })),
                },
                finishReason: choice.finish_reason ?? '',
            })),
            usage: {
                promptTokens: data.usage?.prompt_tokens || 0,
                completionTokens: data.usage?.completion_tokens || 0,
                totalTokens: data.usage?.total_tokens || 0,
            },
        };
    }
}
