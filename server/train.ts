/**
 * Warm up the learned tables by self-play.
 *   npm run train -- --games 50 --difficulty hard
 */
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { logger } from '../src/shared/logger.js';
import { loadDictionary } from '../src/engine/dictionary/loader.js';
import { openModelStore } from '../src/ai/persistence/file-store.js';
import { getCoordinator } from '../src/ai/controller/ai-controller.js';
import { runSelfPlay } from '../src/ai/training/self-play.js';
import { difficultySchema } from '../src/shared/protocol.js';
import { loadServerConfig, modelsDirFor } from './config.js';

const log = logger.child({ module: 'train' });

const argsSchema = z.object({
  games: z.coerce.number().int().min(1).default(20),
  seed: z.coerce.number().int().default(1),
  difficulty: difficultySchema.default('medium'),
  backup: z.string().regex(/^[\w.-]+$/).optional(),
});

const { values } = parseArgs({
  options: {
    games: { type: 'string' },
    seed: { type: 'string' },
    difficulty: { type: 'string' },
    backup: { type: 'string' },
  },
});
const args = argsSchema.parse(values);
const config = loadServerConfig();

const dictionary = loadDictionary();
const store = openModelStore(modelsDirFor(config, args.difficulty));
const coordinator = getCoordinator(args.difficulty, store);

const report = runSelfPlay(coordinator, dictionary, { games: args.games, seed: args.seed });
if (args.backup) coordinator.backup(args.backup);

log.info(
  {
    games: report.games.length,
    accepted: report.accepted,
    rejected: report.rejected,
    redraws: report.redraws,
    stats: coordinator.stats().models,
  },
  'Self-play finished',
);
