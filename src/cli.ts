#!/usr/bin/env node

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { streamAnswer } from './providers/ask.js';
import { DEFAULT_MODEL } from './config/defaults.js';
import { loadEnv, requireApiKey } from './config/env.js';
import { loadPreset, listPresets, loadProjectConfig } from './config/loader.js';
import { DEFAULT_PRESET } from './agents/presets.js';
import { PanelConfigSchema, type PanelConfig } from './config/schema.js';
import { createPanel, type Panel } from './roundtable/engine.js';
import { renderToTerminal, TerminalRenderer } from './output/terminal.js';
import { PreconditionError } from './errors.js';
import { parseArgs, parseSeconds } from './args.js';
import { makeLogger } from './observability/logger.js';

const logger = makeLogger({ component: 'cli' });

const USAGE = `
symposium - Panel discussion simulator

Usage:
  symposium discuss [message] [options]    Start a panel; each line you type runs a round
  symposium ask <question> [--model <m>]   Quick single-model query
  symposium presets                        List available presets

Options:
  --preset <name>        Preset name (default, debate, or your own)
  --model <model>        Model for every speaker without an override (default: ${DEFAULT_MODEL})
  --timeout <s>          Per-speaker timeout in seconds
  --round-timeout <s>    Deadline for a whole round in seconds
  --once                 Run one round for [message] and exit
  --help, -h             Show this help message

In a discussion:
  /history               Print the transcript so far
  /quit                  Leave
`.trim();

function resolveConfig(presetName: string | undefined, flags: Record<string, string>): PanelConfig {
  const project = loadProjectConfig();
  const name = presetName ?? project.defaultPreset;
  let config: PanelConfig;
  if (name) {
    try {
      config = loadPreset(name);
    } catch (err) {
      console.error(`Warning: ${err instanceof Error ? err.message : String(err)} Using built-in default.`);
      config = DEFAULT_PRESET;
    }
  } else {
    try {
      config = loadPreset('default');
    } catch (err) {
      logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'No default preset file');
      config = DEFAULT_PRESET;
    }
  }

  return PanelConfigSchema.parse({
    ...config,
    model: flags['model'] ?? project.defaultModel ?? config.model,
    agentTimeout: parseSeconds('timeout', flags['timeout']) ?? config.agentTimeout,
    roundTimeout: parseSeconds('round-timeout', flags['round-timeout']) ?? config.roundTimeout,
  });
}

async function runRound(panel: Panel, message: string, renderer: TerminalRenderer): Promise<void> {
  await renderToTerminal(panel.say(message), renderer);
}

async function handleDiscuss(opening: string, flags: Record<string, string>): Promise<void> {
  const config = resolveConfig(flags['preset'], flags);
  const panel = createPanel(config, { env: loadEnv() });
  const renderer = new TerminalRenderer();

  console.log(`\x1b[1m--- ${config.name ?? 'Panel'} ---\x1b[0m`);
  console.log(`\x1b[2mSpeakers: ${config.agents.map((a) => a.name).join(', ')}\x1b[0m`);

  if (opening) {
    await runRound(panel, opening, renderer);
    if (flags['once']) return;
  } else if (flags['once']) {
    throw new PreconditionError('--once needs an opening message');
  }

  const rl = createInterface({ input: stdin, output: stdout });
  try {
    while (true) {
      const line = (await rl.question(`${config.userLabel}> `)).trim();
      if (!line) continue;
      if (line === '/quit' || line === '/exit') break;
      if (line === '/history') {
        console.log(panel.history.length > 0 ? `\n${panel.history.render()}\n` : '(no turns yet)');
        continue;
      }
      await runRound(panel, line, renderer);
    }
  } finally {
    rl.close();
  }
}

async function handleAsk(question: string, model: string): Promise<void> {
  if (!question) {
    throw new PreconditionError('question is required. Usage: symposium ask "your question"');
  }
  const env = loadEnv();
  requireApiKey(env);

  console.log(`\x1b[2m[${model}]\x1b[0m\n`);
  for await (const chunk of streamAnswer([{ role: 'user', content: question }], model, env)) {
    process.stdout.write(chunk);
  }
  console.log('\n');
}

function handlePresets(): void {
  const presets = listPresets();
  if (presets.length === 0) {
    console.log('No presets found.');
    return;
  }
  console.log('\nAvailable presets:\n');
  for (const p of presets) {
    const badge = p.source === 'builtin' ? '\x1b[2m[builtin]\x1b[0m' : `\x1b[33m[${p.source}]\x1b[0m`;
    console.log(`  \x1b[1m${p.name}\x1b[0m ${badge}`);
    if (p.description) console.log(`    ${p.description}`);
  }
  console.log('\nUsage: symposium discuss --preset <name>\n');
}

async function main(): Promise<void> {
  const { command, positional, flags } = parseArgs(process.argv.slice(2));

  if (flags['help'] || command === 'help' || command === '--help' || command === '-h') {
    console.log(USAGE);
    return;
  }

  switch (command) {
    case 'discuss':
      await handleDiscuss(positional, flags);
      break;

    case 'ask':
      await handleAsk(positional, flags['model'] ?? loadProjectConfig().defaultModel ?? DEFAULT_MODEL);
      break;

    case 'presets':
      handlePresets();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  if (err instanceof PreconditionError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
