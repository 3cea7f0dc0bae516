import { createLogger, NAMESPACES } from '../logging.js';
import { SaveStore, isUnreadableSave } from '../persistence/SaveStore.js';
import { MasterAgent } from './MasterAgent.js';

const bootLog = createLogger(NAMESPACES.campaign.master);

export interface BootstrapOptions {
  master: MasterAgent;
  saves: SaveStore;
  /** Campaign name to resume; the newest save of any campaign when omitted. */
  campaign?: string;
  /** Skip saves and start planning. */
  fresh?: boolean;
}

export type BootstrapResult =
  | { kind: 'resumed'; path: string }
  | { kind: 'planning'; reason: 'new' | 'no-save' | 'unreadable-save' };

/**
 * Put a fresh Master Agent into Active (from the newest save) or Planning.
 * An unreadable save is reported and left on disk untouched.
 */
export async function bootstrapCampaign(options: BootstrapOptions): Promise<BootstrapResult> {
  const { master, saves, campaign } = options;
  if (options.fresh) {
    master.beginPlanning(campaign);
    return { kind: 'planning', reason: 'new' };
  }

  try {
    const result = await saves.resume(campaign);
    if (result.kind === 'no-save') {
      master.beginPlanning(campaign);
      return { kind: 'planning', reason: 'no-save' };
    }
    master.restore(result.state);
    bootLog('resumed from %s', result.path);
    return { kind: 'resumed', path: result.path };
  } catch (error) {
    if (!isUnreadableSave(error)) throw error;
    console.warn(`[CAMPAIGN] Could not load the latest save (${error.message}); starting a new campaign. The save file was left in place.`);
    master.beginPlanning(campaign);
    return { kind: 'planning', reason: 'unreadable-save' };
  }
}
