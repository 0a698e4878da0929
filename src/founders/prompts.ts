/**
 * Prompts for founder research
 */

import type { Company } from './companies.js';
import { FINAL_TAG, PROGRESS_TAG } from './extractor.js';

export const getFounderSystemPrompt = (maxTurns: number) => `You are a research assistant specialized in finding company founders.

Your task: find the names of the original founders/co-founders of one company.

Rules:
- Return ONLY people who started the company (founders and co-founders)
- Do NOT include advisors, investors, board members, or later employees
- Prefer original founders over interim or replacement CEOs
- Use web_search to find sources and web_fetch to read the most promising pages
- If you cannot find reliable founder information, answer with an empty list

You have at most ${maxTurns} turns. Every time you learn something, report what you have so far:
<${PROGRESS_TAG}>["Name One", "Name Two"]</${PROGRESS_TAG}>

When you are confident, give your final answer exactly once:
<${FINAL_TAG}>["Name One", "Name Two"]</${FINAL_TAG}>

If no founders can be found: <${FINAL_TAG}>[]</${FINAL_TAG}>

The content of both tags must be a JSON array of strings. Be concise and factual.`;

export function getFounderPrompt(company: Company): string {
    const subject = company.url ? `${company.name} (${company.url})` : company.name;
    return `Find the founders of ${subject}.

Report interim findings in <${PROGRESS_TAG}> tags and finish with a <${FINAL_TAG}> tag containing a JSON array of founder names.
Example: <${FINAL_TAG}>["Name1", "Name2"]</${FINAL_TAG}>`;
}
