/**
 * Prompt Builder
 *
 * Reads prompt templates from the prompts directory and assembles the system
 * prompt and the initial user prompt of a run. Templates are cached with
 * mtime-based invalidation; a missing file falls back to a built-in default.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { AgentToolDefinition } from '../types/agent-types.js';

export const DEFAULT_PROMPTS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../prompts');

export const SYSTEM_PROMPT_FILE = 'system.md';
export const NOTIFICATION_PROMPT_FILE = 'notification.md';

const DEFAULT_SYSTEM_PROMPT = `You are an e-mail orchestration agent.
A new e-mail has arrived in a monitored mailbox. Decide which of the available tools should process it and invoke it.
Only call tools that appear in the tool list. When the work is done, reply with a short summary of what was done.`;

const DEFAULT_NOTIFICATION_PROMPT = `A notification arrived for a new e-mail with ID '{{message_id}}'.
Decide which tool is appropriate to process this message and invoke it, passing the message_id.`;

export interface PromptBuilderConfig {
  promptsDir?: string;
}

export class PromptBuilder {
  private promptsDir: string;
  private cache = new Map<string, { content: string; mtimeMs: number }>();

  constructor(config: PromptBuilderConfig = {}) {
    this.promptsDir = config.promptsDir ?? DEFAULT_PROMPTS_DIR;
  }

  buildSystemPrompt(tools: AgentToolDefinition[]): string {
    const base = this.readTemplate(SYSTEM_PROMPT_FILE) ?? DEFAULT_SYSTEM_PROMPT;
    if (tools.length === 0) return base;

    const lines = ['[AVAILABLE TOOLS]'];
    for (const tool of tools) {
      lines.push(`- ${tool.name}: ${tool.description.split('\n')[0] ?? ''}`.trimEnd());
    }
    lines.push('[END AVAILABLE TOOLS]');
    return `${base}\n\n${lines.join('\n')}`;
  }

  /** First user message of a run started by an e-mail notification */
  buildNotificationPrompt(messageId: string): string {
    const template = this.readTemplate(NOTIFICATION_PROMPT_FILE) ?? DEFAULT_NOTIFICATION_PROMPT;
    return renderTemplate(template, { message_id: messageId });
  }

  private readTemplate(name: string): string | null {
    const filePath = path.join(this.promptsDir, name);

    let mtimeMs: number;
    try {
      mtimeMs = fs.statSync(filePath).mtimeMs;
    } catch {
      return null;
    }

    const cached = this.cache.get(name);
    if (cached && cached.mtimeMs === mtimeMs) return cached.content;

    const content = fs.readFileSync(filePath, 'utf8').trim();
    if (!content) return null;
    this.cache.set(name, { content, mtimeMs });
    return content;
  }
}

/** Replace `{{name}}` placeholders; unknown placeholders are left as is. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, key: string) => values[key] ?? match);
}
