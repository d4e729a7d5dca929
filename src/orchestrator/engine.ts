/**
 * Engine
 *
 * Wires a project config into a scorer and trend tracker over the
 * configured snapshot store. Callers close the engine when done.
 */

import type { ProjectConfig } from '../config/types.js';
import type { ResolvedScoringConfig } from '../config/scoring-config.js';
import { resolveScoringConfig } from '../config/scoring-config.js';
import { MomentumScorer } from '../scoring/momentum-scorer.js';
import { TrendTracker } from '../history/trend-tracker.js';
import { openSnapshotStore } from '../history/store-factory.js';
import type { OpenedStore } from '../history/store-factory.js';
import type { ScoringRunInput, ScoringRunResult } from './scoring-run.js';
import { runScoringPass } from './scoring-run.js';

export interface Engine {
  config: ResolvedScoringConfig;
  scorer: MomentumScorer;
  tracker: TrendTracker;
  storage: OpenedStore;
  run(input: ScoringRunInput): ScoringRunResult;
  close(): void;
}

export function openEngine(project: ProjectConfig): Engine {
  const config = resolveScoringConfig(project.scoring);
  const storage = openSnapshotStore(project.storage);
  const scorer = new MomentumScorer({ config });
  const tracker = new TrendTracker(storage.store, { window: config.trendWindow });

  return {
    config,
    scorer,
    tracker,
    storage,
    run: (input) => runScoringPass(input, { scorer, tracker }),
    close: () => storage.close(),
  };
}

/** Open an engine, run `fn`, and close it again. */
export function withEngine<T>(project: ProjectConfig, fn: (engine: Engine) => T): T {
  const engine = openEngine(project);
  try {
    return fn(engine);
  } finally {
    engine.close();
  }
}
