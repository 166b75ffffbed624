#!/usr/bin/env node
/**
 * Simulate AI-vs-AI games and optionally write a transcript.
 *
 * Usage:
 *   npm run simulate -- [--players 2] [--seed 42] [--games 1]
 *                       [--strategies greedy,random] [--max-steps 1000]
 *                       [--out data/transcripts/game.json]
 *
 * With --out, only the last game's transcript is written.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, resolveLogLevel } from '../src/core-engine/Logger';
import { GameError } from '../src/core-engine/EngineErrors';
import { createRng, randomSeed } from '../src/core-engine/SeededRng';
import { GameEngine } from '../src/rule-engine/GameEngine';
import { AiPlayer, strategyByName } from '../src/ai/AiStrategy';
import { DEFAULT_MAX_STEPS, playGame } from '../src/ai/GameRunner';
import { TranscriptRecorder } from '../src/transcript/GameTranscript';

// ── CLI Arg Parsing ─────────────────────────────────────────

interface SimulateArgs {
  players: number;
  seed: number;
  games: number;
  strategies: string[];
  maxSteps: number;
  out: string;
}

const USAGE = `
Usage: npm run simulate -- [options]

Options:
  --players <n>        Number of players, 2-4 (default: 2)
  --seed <n>           Engine seed (default: random)
  --games <n>          Games to play from the seed (default: 1)
  --strategies <list>  Comma-separated: greedy, random, purchasefirst (default: greedy)
  --max-steps <n>      Step budget per game (default: ${DEFAULT_MAX_STEPS})
  --out <file>         Write the last game's transcript JSON here
`;

function parseIntArg(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n)) {
    console.error(`Error: ${flag} expects an integer, got "${value ?? ''}"`);
    process.exit(1);
  }
  return n;
}

function parseArgs(): SimulateArgs {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    process.exit(0);
  }

  const parsed: SimulateArgs = {
    players: 2,
    seed: randomSeed(),
    games: 1,
    strategies: ['greedy'],
    maxSteps: DEFAULT_MAX_STEPS,
    out: '',
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--players':
        parsed.players = parseIntArg('--players', args[++i]);
        break;
      case '--seed':
        parsed.seed = parseIntArg('--seed', args[++i]);
        break;
      case '--games':
        parsed.games = parseIntArg('--games', args[++i]);
        break;
      case '--max-steps':
        parsed.maxSteps = parseIntArg('--max-steps', args[++i]);
        break;
      case '--strategies':
        parsed.strategies = (args[++i] ?? '').split(',').filter(s => s !== '');
        break;
      case '--out':
      case '-o':
        parsed.out = args[++i] ?? '';
        break;
      default:
        console.error(`Error: Unknown argument ${args[i]}`);
        console.log(USAGE);
        process.exit(1);
    }
  }

  return parsed;
}

// ── Main ────────────────────────────────────────────────────

function main(): void {
  const args = parseArgs();
  const log = createLogger('simulate', { level: resolveLogLevel() });

  const strategies = Array.from({ length: args.players }, (_, seat) => {
    const name = args.strategies[seat % Math.max(1, args.strategies.length)] ?? 'greedy';
    const strategy = strategyByName(name);
    if (!strategy) {
      console.error(`Error: Unknown strategy "${name}"`);
      process.exit(1);
    }
    return strategy;
  });

  const engine = new GameEngine({ numPlayers: args.players, seed: args.seed });
  const recorder = new TranscriptRecorder(engine, strategies.map(s => s.name));
  const seats = strategies.map((s, seat) => new AiPlayer(s, createRng(args.seed + seat + 1).asSource()));

  const wins = new Array<number>(args.players).fill(0);
  let unfinished = 0;
  let stalled = 0;

  for (let game = 1; game <= args.games; game++) {
    engine.reset();
    const result = playGame(engine, seats, { maxSteps: args.maxSteps });
    if (result.winner !== null) wins[result.winner]++;
    if (result.stalled) {
      stalled++;
      log.warn(
        `Game ${game}: seat ${engine.state.currentPlayerIndex} has no legal action ` +
          `after ${result.steps} steps (${result.scores.join(' / ')})`,
      );
      continue;
    }
    if (!result.completed) unfinished++;
    log.info(
      `Game ${game}: ${result.completed ? `seat ${result.winner} wins` : 'unfinished'} ` +
        `after ${result.steps} steps (${result.scores.join(' / ')})`,
    );
  }

  console.log(`Seed ${args.seed}, ${args.games} game(s), ${args.players} players`);
  strategies.forEach((s, seat) => {
    console.log(`  Seat ${seat} (${s.name}): ${wins[seat]} win(s)`);
  });
  if (unfinished > 0) console.log(`  Unfinished: ${unfinished}`);
  if (stalled > 0) console.log(`  Stalled (no legal action): ${stalled}`);

  if (args.out) {
    const transcript = recorder.finalize();
    const outPath = path.resolve(args.out);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, JSON.stringify(transcript, null, 2) + '\n');
    console.log(`Transcript written to ${outPath}`);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof GameError) {
    console.error(`Error [${err.code}]: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
