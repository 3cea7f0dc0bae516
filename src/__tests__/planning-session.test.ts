import { describe, it, expect, vi } from 'vitest';
import type { CampaignPlanner, PlanningExchange } from '../agents/PlannerAgent.js';
import type { CampaignDraft } from '../campaign/MasterAgent.js';
import { PlanningSession, planInteractively } from '../campaign/PlanningSession.js';
import { CollaboratorError, InvalidStateTransition } from '../errors.js';

class ScriptedPlanner implements CampaignPlanner {
  readonly drafts: PlanningExchange[][] = [];
  /** Calls (1-based, across both methods) that fail with a CollaboratorError. */
  failOn = new Set<number>();
  private calls = 0;

  private maybeFail(): void {
    this.calls += 1;
    if (this.failOn.has(this.calls)) throw new CollaboratorError('planner', false, 'invalid JSON');
  }

  async nextQuestion(exchanges: readonly PlanningExchange[]): Promise<string> {
    this.maybeFail();
    return `Question ${exchanges.length + 1}?`;
  }

  async draftPlan(exchanges: readonly PlanningExchange[]): Promise<CampaignDraft> {
    this.maybeFail();
    this.drafts.push([...exchanges]);
    return { title: 'Salt & Ember', acts: exchanges.map((exchange) => exchange.answer) };
  }
}

describe('PlanningSession', () => {
  it('asks questions until the player says done', async () => {
    const planner = new ScriptedPlanner();
    const session = new PlanningSession(planner);

    expect(await session.start()).toBe('Question 1?');
    expect(await session.answer(' A harbour town ')).toEqual({ kind: 'question', question: 'Question 2?' });
    const step = await session.answer('DONE');

    expect(step).toEqual({ kind: 'plan', plan: { title: 'Salt & Ember', acts: ['A harbour town'] } });
    expect(planner.drafts).toEqual([[{ question: 'Question 1?', answer: 'A harbour town' }]]);
    await expect(session.answer('more')).rejects.toThrow('Cannot answer while planning finished');
  });

  it('drafts the plan once the question limit is reached', async () => {
    const session = new PlanningSession(new ScriptedPlanner(), 2);
    await session.start();
    await session.answer('Pirates');
    const step = await session.answer('Storms');

    expect(step.kind).toBe('plan');
    expect(session.history).toHaveLength(2);
  });

  it('must be started before answering, and only once', async () => {
    const session = new PlanningSession(new ScriptedPlanner());
    await expect(session.answer('hello')).rejects.toThrow(InvalidStateTransition);
    await session.start();
    await expect(session.start()).rejects.toThrow('Cannot start planning while planning in progress');
  });

  it('keeps the session unchanged when the planner fails', async () => {
    const planner = new ScriptedPlanner();
    planner.failOn = new Set([2]);
    const session = new PlanningSession(planner);
    await session.start();

    await expect(session.answer('Pirates')).rejects.toThrow(CollaboratorError);
    expect(session.history).toEqual([]);
    expect(await session.answer('Pirates')).toEqual({ kind: 'question', question: 'Question 2?' });
    expect(session.history).toEqual([{ question: 'Question 1?', answer: 'Pirates' }]);
  });
});

describe('planInteractively', () => {
  it('reports planner failures and asks again without losing earlier answers', async () => {
    const planner = new ScriptedPlanner();
    // The opening question and the first draft fail
    planner.failOn = new Set([1, 4]);
    const answers = ['', 'Pirates', 'done', 'done'];
    const ask = vi.fn(async (_prompt: string) => answers.shift() ?? 'done');
    const failures: string[] = [];

    const plan = await planInteractively(new PlanningSession(planner), ask, (error) => failures.push(error.message));

    expect(plan).toEqual({ title: 'Salt & Ember', acts: ['Pirates'] });
    expect(failures).toEqual(['planner failed: invalid JSON', 'planner failed: invalid JSON']);
    expect(ask.mock.calls.map((call) => call[0])).toEqual(['Press Enter to try again.', 'Question 1?', 'Question 2?', 'Question 2?']);
    expect(planner.drafts).toEqual([[{ question: 'Question 1?', answer: 'Pirates' }]]);
  });

  it('lets other errors through', async () => {
    const session = new PlanningSession(new ScriptedPlanner());
    await session.start();
    await expect(planInteractively(session, async () => 'x', () => undefined)).rejects.toThrow(InvalidStateTransition);
  });
});
