/**
 * Play one scored episode with a baseline agent and print the report.
 *
 * Env: AGENT (idle | spin | nearest), SCENARIO, SEED, TIME_LIMIT, PRINTS.
 */

import { resolveSettings } from '../engine/settings';
import type { EnvironmentSettings } from '../engine/settings';
import { ConfigurationError } from '../engine/errors';
import { toScoreReport } from '../engine/score';
import { AGENTS } from './agents';
import { runEpisode } from './episode';

const agentId = process.env.AGENT ?? 'nearest';
const createAgent = AGENTS[agentId];
if (!createAgent) {
  console.error(`[episode] Unknown agent "${agentId}". Available: ${Object.keys(AGENTS).join(', ')}`);
  process.exit(1);
}

const seed = parseInt(process.env.SEED ?? '0', 10);
if (!Number.isInteger(seed)) {
  console.error(`[episode] Invalid seed: ${process.env.SEED}`);
  process.exit(1);
}

const timeLimit = Number(process.env.TIME_LIMIT ?? '120');

let settings: EnvironmentSettings;
try {
  settings = resolveSettings({
    scenario: process.env.SCENARIO ?? 'default',
    timeLimit,
    trackComputeCost: true,
    prints: process.env.PRINTS === '1',
  });
} catch (err) {
  if (!(err instanceof ConfigurationError)) throw err;
  console.error(`[episode] ${err.message}`);
  process.exit(1);
}

const score = runEpisode(createAgent(), settings, { seed });
console.log(JSON.stringify(toScoreReport(score), null, 2));
