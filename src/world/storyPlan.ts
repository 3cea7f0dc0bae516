import { BeatTransition, StoryBeat } from '../campaign/types.js';
import { InvalidBeatTransition } from '../errors.js';

export function createStoryPlan(descriptions: readonly string[], activateFirst = true): StoryBeat[] {
  return descriptions
    .map((d) => d.trim())
    .filter(Boolean)
    .map((description, index): StoryBeat => ({
      order: index + 1,
      description,
      status: activateFirst && index === 0 ? 'active' : 'pending'
    }));
}

export function activeBeat(plan: readonly StoryBeat[]): StoryBeat | undefined {
  return plan.find((beat) => beat.status === 'active');
}

/** Orders must run 1..n and at most one beat may be active. */
export function validateStoryPlan(plan: readonly StoryBeat[]): void {
  plan.forEach((beat, index) => {
    if (beat.order !== index + 1) {
      throw new InvalidBeatTransition(`Story plan orders must be contiguous from 1; found ${beat.order} at position ${index + 1}`);
    }
  });
  const active = plan.filter((beat) => beat.status === 'active');
  if (active.length > 1) {
    throw new InvalidBeatTransition(`Story plan has ${active.length} active beats (${active.map((b) => b.order).join(', ')})`);
  }
}

/**
 * Return a new plan with one beat's status changed. Activating a beat while a
 * different one is active is rejected; the input plan is never modified.
 * Marking the active beat done activates the next pending beat.
 */
export function applyBeatTransition(plan: readonly StoryBeat[], transition: BeatTransition): StoryBeat[] {
  const target = plan.find((beat) => beat.order === transition.order);
  if (!target) {
    throw new InvalidBeatTransition(`No story beat with order ${transition.order}`);
  }
  if (transition.status === 'active') {
    const current = activeBeat(plan);
    if (current && current.order !== target.order) {
      throw new InvalidBeatTransition(`Beat ${current.order} is already active; cannot activate beat ${target.order}`);
    }
  }
  const next = plan.map((beat) => (beat.order === target.order ? { ...beat, status: transition.status } : { ...beat }));
  if (transition.status === 'done' && target.status === 'active') {
    // Finishing the active beat hands the story to the next pending one
    const following = next.find((beat) => beat.order > target.order && beat.status === 'pending');
    if (following) following.status = 'active';
  }
  return next;
}
