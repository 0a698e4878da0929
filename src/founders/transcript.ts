/**
 * Per-company conversation log, written as the agent runs
 */

import { appendFile, mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { AgentEvent } from '../agent/types.js';

const RESULT_PREVIEW_CHARS = 600;

export function transcriptFileName(companyName: string): string {
    const safe = companyName.trim().replace(/\s+/g, '_').replace(/[\\/:*?"<>|]/g, '_');
    return `${safe || 'company'}_conversation.log`;
}

export function formatAgentEvent(event: AgentEvent): string {
    switch (event.kind) {
        case 'text':
            return `[agent]\n${event.text}\n`;
        case 'tool_use':
            return `[tool_use] ${event.name} ${JSON.stringify(event.input)}\n`;
        case 'tool_result': {
            const label = event.isError ? '[tool_error]' : '[tool_result]';
            const preview = event.content.length > RESULT_PREVIEW_CHARS
                ? `${event.content.slice(0, RESULT_PREVIEW_CHARS)}… (${event.content.length} chars)`
                : event.content;
            return `${label} ${event.name}\n${preview}\n`;
        }
    }
}

/**
 * Append-only transcript. The first failed write disables the log and is kept in
 * `error` so the caller can report it; lookups never fail because of logging.
 */
export class ConversationLog {
    readonly filePath: string;
    private failure: Error | null = null;

    private constructor(filePath: string) {
        this.filePath = filePath;
    }

    static async open(logDir: string, companyName: string, header: string): Promise<ConversationLog> {
        const log = new ConversationLog(path.join(logDir, transcriptFileName(companyName)));
        await log.capture(async () => {
            await mkdir(logDir, { recursive: true });
            await writeFile(log.filePath, `${header}\n`, 'utf8');
        });
        return log;
    }

    get error(): Error | null {
        return this.failure;
    }

    async write(text: string): Promise<void> {
        await this.capture(() => appendFile(this.filePath, text.endsWith('\n') ? text : `${text}\n`, 'utf8'));
    }

    async event(event: AgentEvent): Promise<void> {
        await this.write(formatAgentEvent(event));
    }

    private async capture(operation: () => Promise<void>): Promise<void> {
        if (this.failure) return;
        try {
            await operation();
        } catch (error) {
            this.failure = error instanceof Error ? error : new Error(String(error));
        }
    }
}
