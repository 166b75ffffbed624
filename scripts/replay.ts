#!/usr/bin/env node
/**
 * Replay Tool -- re-runs a JSON game transcript against the current
 * rules and reports whether it still reproduces.
 *
 * Usage:
 *   npm run replay -- <transcript.json>
 *
 * The tool:
 *   1. Parses CLI args (transcript path)
 *   2. Reads the file and parses it as JSON
 *   3. Rebuilds the game from the recorded seed and applies every action
 *   4. Compares the final state with the recorded one
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { GameError } from '../src/core-engine/EngineErrors';
import { replayTranscript } from '../src/transcript/GameTranscript';

// ── CLI Arg Parsing ─────────────────────────────────────────

function parseArgs(): { transcriptPath: string } {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(`
Usage: npm run replay -- <transcript.json>

Arguments:
  <transcript.json>   Path to a transcript written by npm run simulate -- --out

Example:
  npm run replay -- data/transcripts/game.json
`);
    process.exit(0);
  }

  const transcriptPath = args.find(a => !a.startsWith('-')) ?? '';
  if (!transcriptPath) {
    console.error('Error: No transcript file specified.');
    process.exit(1);
  }

  return { transcriptPath };
}

// ── Transcript Loading ──────────────────────────────────────

function loadTranscript(filePath: string): unknown {
  const resolved = path.resolve(filePath);

  if (!fs.existsSync(resolved)) {
    console.error(`Error: Transcript file not found: ${resolved}`);
    process.exit(1);
  }

  const rawContent = fs.readFileSync(resolved, 'utf-8');
  try {
    return JSON.parse(rawContent);
  } catch (err) {
    console.error(`Error: Transcript file contains invalid JSON: ${String(err)}`);
    process.exit(1);
  }
}

// ── Main ────────────────────────────────────────────────────

const { transcriptPath } = parseArgs();
const raw = loadTranscript(transcriptPath);

try {
  const { state, steps } = replayTranscript(raw);
  console.log(`Replayed ${steps} steps from ${transcriptPath}`);
  console.log(
    state.gameOver
      ? `  Winner: seat ${state.winner} (${state.players.map(p => p.points).join(' / ')})`
      : '  Game unfinished',
  );
} catch (err) {
  if (err instanceof GameError) {
    console.error(`Replay failed [${err.code}]: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
