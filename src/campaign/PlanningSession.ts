import type { CampaignPlanner, PlanningExchange } from '../agents/PlannerAgent.js';
import { CollaboratorError, InvalidStateTransition } from '../errors.js';
import type { CampaignDraft } from './MasterAgent.js';

export type PlanningStep = { kind: 'question'; question: string } | { kind: 'plan'; plan: CampaignDraft };

const DONE_WORDS = ['done', 'finish', 'finished'];

/**
 * Question/answer loop before a campaign exists. The player ends it by
 * answering "done"; the planner then drafts the plan. A planner failure
 * leaves the session where it was, so the same answer can be given again.
 */
export class PlanningSession {
  private exchanges: PlanningExchange[] = [];
  private pendingQuestion?: string;
  private finished = false;

  constructor(
    private readonly planner: CampaignPlanner,
    private readonly maxQuestions = 12
  ) {}

  get history(): readonly PlanningExchange[] {
    return this.exchanges;
  }

  async start(): Promise<string> {
    if (this.pendingQuestion !== undefined || this.finished) {
      throw new InvalidStateTransition('planning in progress', 'start planning');
    }
    this.pendingQuestion = await this.planner.nextQuestion(this.exchanges);
    return this.pendingQuestion;
  }

  async answer(text: string): Promise<PlanningStep> {
    const question = this.pendingQuestion;
    if (question === undefined || this.finished) {
      throw new InvalidStateTransition(this.finished ? 'planning finished' : 'planning not started', 'answer');
    }
    const trimmed = text.trim();
    const done = DONE_WORDS.includes(trimmed.toLowerCase());
    const exchanges = done ? this.exchanges : [...this.exchanges, { question, answer: trimmed }];

    if (done || exchanges.length >= this.maxQuestions) {
      const plan = await this.planner.draftPlan(exchanges);
      this.exchanges = exchanges;
      this.finished = true;
      this.pendingQuestion = undefined;
      return { kind: 'plan', plan };
    }
    const next = await this.planner.nextQuestion(exchanges);
    this.exchanges = exchanges;
    this.pendingQuestion = next;
    return { kind: 'question', question: next };
  }
}

/**
 * Run a session to its plan. A CollaboratorError is handed to `onFailure` and
 * the player is asked again; answers already given are kept.
 */
export async function planInteractively(
  session: PlanningSession,
  ask: (prompt: string) => Promise<string>,
  onFailure: (error: CollaboratorError) => void
): Promise<CampaignDraft> {
  let question: string | undefined;
  for (;;) {
    try {
      if (question === undefined) {
        question = await session.start();
        continue;
      }
      const step = await session.answer(await ask(question));
      if (step.kind === 'plan') return step.plan;
      question = step.question;
    } catch (error) {
      if (!(error instanceof CollaboratorError)) throw error;
      onFailure(error);
      if (question === undefined) await ask('Press Enter to try again.');
    }
  }
}
