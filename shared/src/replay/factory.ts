/**
 * Build a replay engine from platform sinks and settings
 */

import { LogCallback, silentLog } from '../logging';
import { Settings } from '../settings';
import { BestEffortStrategy } from './best-effort';
import { DirectInjectionStrategy } from './direct-injection';
import { ReplayEngine } from './engine';
import { ScriptedKeystrokeStrategy } from './scripted-keystroke';
import {
  BestEffortSink,
  DelayFn,
  ReplayStrategy,
  ScriptRunner,
  SyntheticInputSink,
} from './types';

/**
 * Delivery paths for the three tiers
 */
export interface ReplaySinks {
  direct: SyntheticInputSink;
  scripted: ScriptRunner;
  bestEffort: BestEffortSink;
}

/**
 * Create an engine with one strategy per enabled tier
 */
export function createReplayEngine(
  sinks: ReplaySinks,
  settings: Settings,
  onLog: LogCallback = silentLog,
  delay?: DelayFn
): ReplayEngine {
  const strategies: ReplayStrategy[] = [];

  for (const tier of settings.enabledTiers) {
    switch (tier) {
      case 'direct':
        strategies.push(new DirectInjectionStrategy(sinks.direct, {
          interEventDelayMs: settings.interEventDelayMs,
          delay,
          onLog,
        }));
        break;
      case 'scripted':
        strategies.push(new ScriptedKeystrokeStrategy(sinks.scripted, { onLog }));
        break;
      case 'best-effort':
        strategies.push(new BestEffortStrategy(sinks.bestEffort, {
          keyDelayMs: settings.bestEffortKeyDelayMs,
          releaseDelayMs: settings.bestEffortReleaseDelayMs,
          delay,
          onLog,
        }));
        break;
    }
  }

  return new ReplayEngine(strategies, { onLog });
}
