import nunjucks from 'nunjucks';
import type { ValidateFunction } from 'ajv';
import { BaseAgent } from './BaseAgent.js';
import { loadValidator } from './context/jsonValidation.js';
import { ConfigManager } from '../configManager.js';
import type { CampaignDraft } from '../campaign/MasterAgent.js';
import { createLogger, NAMESPACES } from '../logging.js';

const plannerLog = createLogger(NAMESPACES.agents.planner);

export interface PlanningExchange {
  question: string;
  answer: string;
}

export interface CampaignPlanner {
  nextQuestion(exchanges: readonly PlanningExchange[]): Promise<string>;
  draftPlan(exchanges: readonly PlanningExchange[]): Promise<CampaignDraft>;
}

interface RawEntity {
  name: string;
  description?: string;
  tags?: string[];
}

/** Shape of src/schemas/campaign-plan.schema.json. */
interface CampaignPlanResponse {
  title: string;
  synopsis?: string;
  acts: string[];
  npcs?: RawEntity[];
  locations?: RawEntity[];
  openThreads?: string[];
}

const toEntity = (raw: RawEntity) => ({ name: raw.name, description: raw.description ?? '', tags: raw.tags ?? [] });

export class PlannerAgent extends BaseAgent implements CampaignPlanner {
  private readonly validator: ValidateFunction<CampaignPlanResponse>;

  constructor(configManager: ConfigManager, env: nunjucks.Environment) {
    super('planner', configManager, env);
    this.validator = loadValidator<CampaignPlanResponse>('campaign-plan');
  }

  async nextQuestion(exchanges: readonly PlanningExchange[]): Promise<string> {
    const systemPrompt = this.renderTemplate('planner-question', { exchanges });
    const response = await this.callLLM(systemPrompt, exchanges.length === 0 ? 'Ask your first question.' : 'Ask the next question.');
    return this.cleanResponse(response);
  }

  async draftPlan(exchanges: readonly PlanningExchange[]): Promise<CampaignDraft> {
    const systemPrompt = this.renderTemplate('planner-plan', { exchanges });
    const plan = await this.callJson(systemPrompt, 'Write the campaign plan now.', this.validator);
    plannerLog('drafted "%s" with %d acts', plan.title, plan.acts.length);
    return {
      title: plan.title,
      synopsis: plan.synopsis,
      acts: plan.acts,
      npcs: (plan.npcs ?? []).map(toEntity),
      locations: (plan.locations ?? []).map(toEntity),
      openThreads: plan.openThreads ?? []
    };
  }
}
