/**
 * Agent boundary types shared by the research agent and its callers
 */

export type ToolName = 'web_search' | 'web_fetch';

export interface TextEvent {
    kind: 'text';
    text: string;
}

export interface ToolUseEvent {
    kind: 'tool_use';
    id: string;
    name: string;
    input: Record<string, unknown>;
}

export interface ToolResultEvent {
    kind: 'tool_result';
    id: string;
    name: string;
    content: string;
    isError: boolean;
}

export type AgentEvent = TextEvent | ToolUseEvent | ToolResultEvent;

export interface AgentRequest {
    prompt: string;
    systemPrompt: string;
    allowedTools: ToolName[];
    maxTurns: number;
}

/**
 * Anything that can answer a research request as a one-shot stream of events.
 */
export interface FounderAgent {
    query(request: AgentRequest): AsyncIterable<AgentEvent>;
}
