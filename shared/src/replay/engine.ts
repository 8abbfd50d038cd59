/**
 * Replay Engine
 *
 * Runs a macro's key sequence through an ordered list of replay strategies
 * until one reports success. Tiers are never retried and never mixed within
 * one replay.
 */

import { REPLAY_ERROR_CODES, ReplayErrorCode, errorMessage } from '../errors';
import { InputEvent } from '../input-event';
import { LogCallback, silentLog } from '../logging';
import { Macro } from '../macro';
import { ReplayTier, TIER_ORDER } from '../settings';
import { ReplayStrategy, TierResult } from './types';

/**
 * One tier's contribution to a replay
 */
export interface TierAttempt {
  tier: ReplayTier;
  result: TierResult;
}

/**
 * Overall result of a replay
 */
export interface ReplayOutcome {
  success: boolean;
  /** Tier that succeeded, null when none ran or all failed */
  tier: ReplayTier | null;
  /** True for an empty sequence: success with nothing done */
  nothingToDo: boolean;
  attempts: TierAttempt[];
  errorCode: ReplayErrorCode;
  errorMessage?: string;
  executionTimeMs: number;
}

export interface ReplayEngineOptions {
  onLog?: LogCallback;
}

export class ReplayEngine {
  private strategies: ReplayStrategy[];
  private log: LogCallback;

  /**
   * Strategies are sorted into tier order; a tier given twice keeps its
   * first strategy.
   */
  constructor(strategies: ReplayStrategy[], options: ReplayEngineOptions = {}) {
    this.strategies = TIER_ORDER
      .map(tier => strategies.find(strategy => strategy.tier === tier))
      .filter((strategy): strategy is ReplayStrategy => strategy !== undefined);
    this.log = options.onLog ?? silentLog;
  }

  /**
   * Tiers this engine will attempt, in order
   */
  getTiers(): ReplayTier[] {
    return this.strategies.map(strategy => strategy.tier);
  }

  /**
   * Replay a macro's key sequence
   */
  async replay(macro: Macro): Promise<ReplayOutcome> {
    this.log('info', `Executing macro: ${macro.name} with ${macro.keySequence.length} keys`);
    return this.replaySequence(macro.keySequence);
  }

  /**
   * Replay a sequence. The sequence is copied before the first tier runs,
   * so later edits to the source array do not affect this replay.
   */
  async replaySequence(source: readonly InputEvent[]): Promise<ReplayOutcome> {
    const startTime = Date.now();
    const sequence = [...source];

    if (sequence.length === 0) {
      return {
        success: true,
        tier: null,
        nothingToDo: true,
        attempts: [],
        errorCode: REPLAY_ERROR_CODES.OK,
        executionTimeMs: 0,
      };
    }

    const attempts: TierAttempt[] = [];
    for (const strategy of this.strategies) {
      const result = await this.runStrategy(strategy, sequence);
      attempts.push({ tier: strategy.tier, result });

      if (result.success) {
        this.log('info', `Macro replayed via ${strategy.tier} tier (${result.delivered} deliveries)`);
        return {
          success: true,
          tier: strategy.tier,
          nothingToDo: false,
          attempts,
          errorCode: REPLAY_ERROR_CODES.OK,
          executionTimeMs: Date.now() - startTime,
        };
      }
      this.log('warn', `${strategy.tier} tier failed, trying next tier`);
    }

    const lastFailure = attempts.length > 0
      ? attempts[attempts.length - 1].result.failures[0]
      : undefined;
    this.log('error', 'All replay tiers failed');
    return {
      success: false,
      tier: null,
      nothingToDo: false,
      attempts,
      errorCode: REPLAY_ERROR_CODES.ALL_TIERS_FAILED,
      errorMessage: lastFailure
        ? `All replay tiers failed: ${lastFailure.message}`
        : 'All replay tiers failed',
      executionTimeMs: Date.now() - startTime,
    };
  }

  private async runStrategy(strategy: ReplayStrategy, sequence: readonly InputEvent[]): Promise<TierResult> {
    try {
      return await strategy.attempt(sequence);
    } catch (error) {
      return {
        success: false,
        delivered: 0,
        failures: [{ index: -1, code: REPLAY_ERROR_CODES.SYNTHESIS_FAILED, message: errorMessage(error) }],
      };
    }
  }
}
