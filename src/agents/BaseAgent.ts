import * as fs from 'fs';
import * as path from 'path';
import nunjucks from 'nunjucks';
import type { ValidateFunction } from 'ajv';
import { chatCompletion } from '../llm/client.js';
import { customLLMRequest } from '../llm/customClient.js';
import { ChatMessage } from '../llm/types.js';
import { ConfigManager, LLMProfile } from '../configManager.js';
import { CollaboratorError, classifyCollaboratorError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { PROMPTS_DIR } from '../paths.js';
import { validateJson } from './context/jsonValidation.js';

const DEFAULT_VALIDATION_RETRIES = 1;

export function estimateWordsFromTokens(tokens: number): number {
  return Math.max(1, Math.round(tokens * 0.75));
}

export function createPromptEnvironment(): nunjucks.Environment {
  return new nunjucks.Environment(new nunjucks.FileSystemLoader(PROMPTS_DIR), { autoescape: false, trimBlocks: true, lstripBlocks: true });
}

/**
 * Shared plumbing for LLM-backed collaborators: profile resolution, prompt
 * rendering, transport (openai or custom completions) and JSON validation
 * with a corrective retry. Failures surface as CollaboratorError.
 */
export abstract class BaseAgent {
  protected readonly configManager: ConfigManager;
  protected readonly env: nunjucks.Environment;
  protected readonly agentName: string;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, configManager: ConfigManager, env: nunjucks.Environment) {
    this.agentName = agentName;
    this.configManager = configManager;
    this.env = env;
    this.env.addFilter('json', (value: unknown) => JSON.stringify(value, null, 2));
  }

  protected getProfile(): LLMProfile {
    const config = this.configManager.getConfig();
    const agentConfig = config.agents?.[this.agentName];
    let profileName = agentConfig?.llmProfile || config.defaultProfile;
    if (profileName === 'default') profileName = config.defaultProfile;

    const baseProfile = this.configManager.getProfile(profileName);
    return {
      ...baseProfile,
      model: agentConfig?.model ?? baseProfile.model,
      sampler: { ...(baseProfile.sampler ?? {}), ...(agentConfig?.sampler ?? {}) }
    };
  }

  protected renderTemplate(templateName: string, context: object): string {
    const templatePath = path.join(PROMPTS_DIR, `${templateName}.njk`);
    const template = fs.readFileSync(templatePath, 'utf-8');
    const result = this.env.renderString(template, { ...context, estimateWordsFromTokens });
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s: %s', templateName, preview);
    return result;
  }

  /** One round trip to the configured backend; transport errors are classified. */
  protected async callLLM(systemPrompt: string, userMessage: string, json = false): Promise<string> {
    const profile = this.getProfile();
    try {
      if (profile.type === 'custom') {
        const prompt = this.renderTemplate('chatml', { system_prompt: systemPrompt, user_message: userMessage });
        return await customLLMRequest(profile, prompt);
      }
      const messages: ChatMessage[] = [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userMessage }
      ];
      return await chatCompletion(profile, messages, { json });
    } catch (error) {
      this.baseAgentLog('[LLM] Call failed for agent %s: %o', this.agentName, error);
      throw classifyCollaboratorError(this.agentName, error);
    }
  }

  /**
   * Ask for JSON matching `validator`, retrying with the validation errors
   * appended to the prompt. Invalid output after the last attempt is a
   * non-retryable CollaboratorError.
   */
  protected async callJson<T>(systemPrompt: string, userMessage: string, validator: ValidateFunction<T>): Promise<T> {
    const maxRetries = Math.max(0, this.configManager.getConfig().agents?.[this.agentName]?.maxValidationRetries ?? DEFAULT_VALIDATION_RETRIES);
    let errors: string[] = [];
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const prompt = attempt === 0 ? systemPrompt : this.buildValidationRetryPrompt(systemPrompt, errors);
      const raw = await this.callLLM(prompt, userMessage, true);
      const result = validateJson(validator, this.cleanResponse(raw));
      if (result.valid) {
        if (result.repaired) this.baseAgentLog('[JSON VALIDATION] agent=%s output needed repair', this.agentName);
        return result.parsed;
      }
      errors = result.errors;
      this.baseAgentLog('[JSON VALIDATION] agent=%s attempt=%d errors=%o', this.agentName, attempt + 1, errors);
    }
    throw new CollaboratorError(this.agentName, false, `invalid JSON after ${maxRetries + 1} attempts (${errors.join('; ')})`);
  }

  private buildValidationRetryPrompt(basePrompt: string, errors: string[]): string {
    const errorText = errors.length > 0 ? errors.join('; ') : 'invalid JSON output';
    return `${basePrompt}\n\n[VALIDATION RETRY]\nPrevious response had invalid JSON (${errorText}). Return valid JSON only, matching the expected schema/object. No commentary.`;
  }

  protected cleanResponse(response: string): string {
    let cleaned = response.trim();

    // Remove markdown code blocks (e.g., ```json ... ```)
    cleaned = cleaned.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '');

    // Remove <thinking> blocks
    cleaned = cleaned.replace(/<thinking>[\s\S]*?<\/thinking>/gi, '').trim();

    return cleaned;
  }
}
