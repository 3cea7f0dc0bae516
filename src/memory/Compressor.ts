import { Summary, Turn } from '../campaign/types.js';
import { MemorySettings } from '../configManager.js';
import { CompressionFailed } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { countTokens, truncateToTokens } from '../utils/tokenCounter.js';
import { BreakKind, BreakSignal, detectBreak } from './breakDetector.js';
import { HistoryBuffer, formatTurn } from './HistoryBuffer.js';

const compressorLog = createLogger(NAMESPACES.memory.compressor);

export interface SummarizeRequest {
  /** Transcript lines or partial summaries, oldest first. */
  lines: string[];
  existingSummary?: string;
  knownNames: string[];
  targetTokens: number;
}

export interface Summarizer {
  summarize(request: SummarizeRequest): Promise<string>;
}

export interface CompressionContext {
  npcNames: readonly string[];
}

export type CompressionReason = 'under-budget' | 'deferred' | 'break' | 'hard-ceiling';

export interface CompressionDecision {
  compress: boolean;
  reason: CompressionReason;
  /** Set when the hard ceiling forced compression without a natural break. */
  fallback: boolean;
  breakKind?: BreakKind;
  cost: number;
}

export type CompressionOutcome =
  | { status: 'skipped'; decision: CompressionDecision }
  | { status: 'compressed'; decision: CompressionDecision; summary: Summary }
  | { status: 'failed'; decision: CompressionDecision; error: CompressionFailed };

export function chunkLines(lines: readonly string[], maxTokens: number, minPerChunk = 1): string[][] {
  const chunks: string[][] = [[]];
  let currentTokens = 0;
  for (const line of lines) {
    const lineTokens = countTokens(line);
    const current = chunks[chunks.length - 1];
    if (current.length >= minPerChunk && currentTokens + lineTokens > maxTokens) {
      chunks.push([]);
      currentTokens = 0;
    }
    chunks[chunks.length - 1].push(line);
    currentTokens += lineTokens;
  }
  return chunks.filter((chunk) => chunk.length > 0);
}

function isMalformed(text: string): boolean {
  if (!/\p{L}/u.test(text)) return true;
  // JSON-shaped output means the summarizer answered with an error envelope, not prose
  return /^[[{]/.test(text) && /[\]}]$/.test(text);
}

export class Compressor {
  private readonly inFlight = new WeakSet<HistoryBuffer>();

  constructor(
    private readonly summarizer: Summarizer,
    private readonly settings: MemorySettings,
    private readonly clock: () => Date = () => new Date()
  ) {}

  evaluate(buffer: HistoryBuffer, signals: readonly BreakSignal[], context: CompressionContext): CompressionDecision {
    const cost = buffer.size();
    const view = buffer.contextView();
    if (view.turns.length === 0) {
      return { compress: false, reason: 'under-budget', fallback: false, cost };
    }

    if (cost > this.settings.hardCeilingTokens) {
      const breakKind = detectBreak(view.turns, signals, { npcNames: context.npcNames, idleTurnThreshold: this.settings.idleTurnThreshold });
      if (breakKind) return { compress: true, reason: 'break', fallback: false, breakKind, cost };
      compressorLog('cost %d above hard ceiling %d without a break; forcing compression', cost, this.settings.hardCeilingTokens);
      return { compress: true, reason: 'hard-ceiling', fallback: true, cost };
    }

    if (cost <= this.settings.budgetTokens) {
      return { compress: false, reason: 'under-budget', fallback: false, cost };
    }

    const breakKind = detectBreak(view.turns, signals, { npcNames: context.npcNames, idleTurnThreshold: this.settings.idleTurnThreshold });
    if (!breakKind) {
      compressorLog('cost %d over budget %d; deferring to the next break', cost, this.settings.budgetTokens);
      return { compress: false, reason: 'deferred', fallback: false, cost };
    }
    return { compress: true, reason: 'break', fallback: false, breakKind, cost };
  }

  /**
   * Summarize everything the buffer still shows (prior summary included) into
   * one summary covering turns 0..last. The buffer is not modified.
   */
  async compress(buffer: HistoryBuffer, context: CompressionContext): Promise<Summary> {
    const lastIndex = buffer.length - 1;
    if (lastIndex < 0) throw new CompressionFailed('buffer is empty');
    const view = buffer.contextView();
    const text = await this.condense(view.turns.map(formatTurn), view.summary?.text, context.npcNames);
    return { covers: { kind: 'turns', from: 0, to: lastIndex }, text, createdAt: this.clock().toISOString() };
  }

  async compactIfNeeded(buffer: HistoryBuffer, signals: readonly BreakSignal[], context: CompressionContext): Promise<CompressionOutcome> {
    const decision = this.evaluate(buffer, signals, context);
    if (!decision.compress || this.inFlight.has(buffer)) {
      return { status: 'skipped', decision };
    }

    this.inFlight.add(buffer);
    try {
      const summary = await this.compress(buffer, context);
      buffer.applySummary(summary);
      compressorLog('compressed buffer (reason=%s fallback=%s) from %d to %d tokens', decision.reason, decision.fallback, decision.cost, buffer.size());
      return { status: 'compressed', decision, summary };
    } catch (error) {
      const failure = error instanceof CompressionFailed ? error : new CompressionFailed(error instanceof Error ? error.message : String(error), error);
      compressorLog('compression failed, keeping uncompressed buffer: %s', failure.message);
      return { status: 'failed', decision, error: failure };
    } finally {
      this.inFlight.delete(buffer);
    }
  }

  async summarizeScene(turns: readonly Turn[], sceneId: string, context: CompressionContext, existingSummary?: string): Promise<Summary> {
    if (turns.length === 0 && !existingSummary) {
      throw new CompressionFailed(`scene ${sceneId} has no turns to summarize`);
    }
    const text = await this.condense(turns.map(formatTurn), existingSummary, context.npcNames);
    return { covers: { kind: 'scene', sceneId }, text, createdAt: this.clock().toISOString() };
  }

  private async condense(lines: string[], existingSummary: string | undefined, npcNames: readonly string[], depth = 0): Promise<string> {
    // Chunk summaries are merged pairwise at least, so each pass shrinks the input
    const chunks = chunkLines(lines, this.settings.chunkTokens, depth === 0 ? 1 : 2);
    if (chunks.length <= 1) {
      return this.summarizeOnce(chunks[0] ?? [], existingSummary, npcNames);
    }
    const partials: string[] = [];
    for (const chunk of chunks) {
      partials.push(await this.summarizeOnce(chunk, undefined, npcNames));
    }
    compressorLog('hierarchical pass %d: %d chunks', depth + 1, partials.length);
    return this.condense(partials, existingSummary, npcNames, depth + 1);
  }

  private async summarizeOnce(lines: string[], existingSummary: string | undefined, npcNames: readonly string[]): Promise<string> {
    let raw: string;
    try {
      raw = await this.summarizer.summarize({
        lines,
        existingSummary,
        knownNames: [...npcNames],
        targetTokens: this.settings.summaryTargetTokens
      });
    } catch (error) {
      throw new CompressionFailed(error instanceof Error ? error.message : String(error), error);
    }

    const text = typeof raw === 'string' ? raw.trim() : '';
    if (!text) throw new CompressionFailed('summarizer returned an empty summary');
    if (isMalformed(text)) throw new CompressionFailed('summarizer returned a malformed summary');
    return truncateToTokens(text, this.settings.summaryTargetTokens);
  }
}
