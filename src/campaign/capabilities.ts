import { Summary, Turn, TurnRole } from './types.js';

/**
 * The small capability set both agent variants share. Callers that need
 * variant-specific behavior switch on `kind`.
 */
export interface TurnAcceptor {
  readonly kind: 'master' | 'scene';
  acceptTurn(role: TurnRole, content: string, speaker?: string): Turn;
  produceSummary(): Promise<Summary | undefined>;
}
