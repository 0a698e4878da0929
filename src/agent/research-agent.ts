/**
 * Research Agent - a bounded tool-calling loop over an OpenRouter chat model
 */

import { z } from 'zod';
import { OpenRouterClient, type Message } from '../clients/openrouter.js';
import { ExaClient } from '../clients/exa.js';
import type { Config } from '../config.js';
import { AgentError, errorMessage } from '../errors.js';
import { WebTools, isToolName } from './tools.js';
import type { AgentEvent, AgentRequest, FounderAgent, ToolName } from './types.js';

const ToolArgumentsSchema = z.record(z.unknown());

export interface ResearchAgentOptions {
    model: string;
    temperature?: number;
    maxTokens?: number;
}

function parseToolArguments(raw: string): Record<string, unknown> {
    if (raw.trim() === '') return {};
    try {
        const parsed = ToolArgumentsSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : {};
    } catch {
        // Malformed arguments fall through to tool validation, which reports them to the model.
        return {};
    }
}

export class ResearchAgent implements FounderAgent {
    private chatClient: Pick<OpenRouterClient, 'chat'>;
    private tools: WebTools;
    private model: string;
    private temperature?: number;
    private maxTokens?: number;

    constructor(chatClient: Pick<OpenRouterClient, 'chat'>, tools: WebTools, options: ResearchAgentOptions) {
        this.chatClient = chatClient;
        this.tools = tools;
        this.model = options.model;
        this.temperature = options.temperature;
        this.maxTokens = options.maxTokens;
    }

    /**
     * Each turn is one chat completion. The stream ends when the model answers without
     * calling a tool or when `maxTurns` completions have been spent.
     */
    async *query(request: AgentRequest): AsyncGenerator<AgentEvent, void, undefined> {
        const messages: Message[] = [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.prompt },
        ];
        const toolDefinitions = this.tools.definitions(request.allowedTools);

        for (let turn = 1; turn <= request.maxTurns; turn++) {
            const lastTurn = turn === request.maxTurns;
            const response = await this.chatClient.chat(this.model, messages, {
                temperature: this.temperature,
                maxTokens: this.maxTokens,
                tools: toolDefinitions,
                // Ask for an answer when no turn is left to read tool results.
                toolChoice: lastTurn ? 'none' : undefined,
            });

            const choice = response.choices[0];
            if (!choice) throw new AgentError('Model returned no choices', turn);

            const { content, toolCalls } = choice.message;
            if (content) yield { kind: 'text', text: content };
            if (toolCalls.length === 0) return;

            if (lastTurn) {
                // The model would never see the results, so the calls are reported but not run.
                for (const call of toolCalls) {
                    yield { kind: 'tool_use', id: call.id, name: call.name, input: parseToolArguments(call.arguments) };
                }
                return;
            }

            messages.push({ role: 'assistant', content, toolCalls });

            for (const call of toolCalls) {
                const input = parseToolArguments(call.arguments);
                yield { kind: 'tool_use', id: call.id, name: call.name, input };

                const result = await this.runTool(call.name, input, request.allowedTools);
                yield { kind: 'tool_result', id: call.id, name: call.name, content: result.content, isError: result.isError };

                messages.push({ role: 'tool', toolCallId: call.id, content: result.content });
            }
        }
    }

    private async runTool(
        name: string,
        input: Record<string, unknown>,
        allowed: ToolName[]
    ): Promise<{ content: string; isError: boolean }> {
        if (!isToolName(name) || !allowed.includes(name)) {
            return { content: `Error: tool "${name}" is not available`, isError: true };
        }
        try {
            return { content: await this.tools.execute(name, input), isError: false };
        } catch (error) {
            return { content: `Error: ${errorMessage(error)}`, isError: true };
        }
    }
}

/**
 * Build the production agent from an explicit configuration.
 */
export function createResearchAgent(config: Pick<Config, 'openrouterApiKey' | 'exaApiKey' | 'model' | 'temperature'>): ResearchAgent {
    const chatClient = new OpenRouterClient(config.openrouterApiKey);
    const tools = new WebTools(new ExaClient(config.exaApiKey));
    return new ResearchAgent(chatClient, tools, {
        model: config.model,
        temperature: config.temperature,
    });
}
