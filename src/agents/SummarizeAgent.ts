import nunjucks from 'nunjucks';
import { BaseAgent } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { SummarizeRequest, Summarizer } from '../memory/Compressor.js';
import { createLogger, NAMESPACES } from '../logging.js';

const summarizeLog = createLogger(NAMESPACES.agents.summarize);

export class SummarizeAgent extends BaseAgent implements Summarizer {
  constructor(configManager: ConfigManager, env: nunjucks.Environment) {
    super('summarize', configManager, env);
  }

  async summarize(request: SummarizeRequest): Promise<string> {
    const systemPrompt = this.renderTemplate('summarize', {
      existingSummary: request.existingSummary,
      knownNames: request.knownNames,
      maxSummaryTokens: request.targetTokens
    });
    summarizeLog('summarizing %d lines (target %d tokens)', request.lines.length, request.targetTokens);
    const response = await this.callLLM(systemPrompt, request.lines.join('\n'));
    return this.cleanResponse(response);
  }
}
