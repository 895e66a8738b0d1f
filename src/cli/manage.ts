#!/usr/bin/env node
import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { CFG, LOG_FILE, loadSettings, settingsPath, updateSettings } from '../config';
import type { Settings } from '../schemas/settings';
import { localSuggestion } from '../engine/fallback';
import { extractFeatures, hasSignals } from '../engine/signals';
import { FileCooldownStore } from '../state/cooldownStore';
import type { Transcript } from '../types';

const USAGE = `Usage: session-guide <command>

Commands:
  status [-v]                  Show whether suggestions are enabled and the cooldown state
  enable | disable | toggle    Turn suggestions on or off
  config [options]             Change settings
      --cooldown <seconds>
      --min-length <chars>
      --decision-model <name>
      --suggestion-model <name>
  logs [-n <lines>]            Show the last log lines (default 20)
  reset-cooldown               Forget when the last suggestion was shown
  test                         Check settings, API key and the offline analysis path
  hooks                        Print the Claude Code hooks configuration`;

function parseIntFlag(name: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 0) {
    throw new Error(`${name} expects a non-negative integer, got ${value ?? 'nothing'}`);
  }
  return n;
}

export function parseConfigFlags(args: string[]): Partial<Settings> {
  const patch: Partial<Settings> = {};
  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[++i];
    switch (flag) {
      case '--cooldown':
        patch.cooldownSeconds = parseIntFlag(flag, value);
        break;
      case '--min-length':
        patch.minSessionLength = parseIntFlag(flag, value);
        break;
      case '--decision-model':
        if (!value) throw new Error(`${flag} expects a model name`);
        patch.decisionModel = value;
        break;
      case '--suggestion-model':
        if (!value) throw new Error(`${flag} expects a model name`);
        patch.suggestionModel = value;
        break;
      default:
        throw new Error(`Unknown option: ${flag}`);
    }
  }
  return patch;
}

export function statusLines(settings: Settings, lastSuggestedAt: number | null, now: Date, verbose: boolean): string[] {
  const lines = [
    `Suggestions: ${settings.enabled ? 'enabled' : 'disabled'}`,
    `API key: ${CFG.OPENAI_API_KEY ? 'configured' : 'missing (set OPENAI_API_KEY)'}`
  ];
  if (lastSuggestedAt === null) {
    lines.push('Last suggestion: never');
  } else {
    const remainingMs = settings.cooldownSeconds * 1000 - (now.getTime() - lastSuggestedAt);
    lines.push(`Last suggestion: ${new Date(lastSuggestedAt).toISOString()}`);
    lines.push(remainingMs > 0
      ? `Cooldown: ${Math.ceil(remainingMs / 1000)}s remaining`
      : 'Cooldown: expired');
  }
  if (verbose) {
    lines.push(`Settings file: ${settingsPath()}`);
    for (const [key, value] of Object.entries(settings)) {
      lines.push(`  ${key}: ${String(value)}`);
    }
  }
  return lines;
}

const SAMPLE_SESSION: Transcript = [
  { role: 'user', text: 'Add a /users endpoint to the Flask app and return JSON.' },
  {
    role: 'assistant',
    text: "Here is the route:\n```python\n@app.route('/users')\ndef list_users():\n    return jsonify(users)\n```"
  }
];

export interface SelfTestResult {
  ok: boolean;
  lines: string[];
}

/** Offline setup check; never calls the model. */
export function selfTest(settings: Settings, apiKey: string): SelfTestResult {
  let ok = true;
  const lines = [settings.enabled ? 'OK   suggestions enabled' : 'WARN suggestions disabled (run: session-guide enable)'];

  if (apiKey) {
    lines.push('OK   API key configured');
  } else {
    ok = false;
    lines.push('FAIL OPENAI_API_KEY is not set');
  }

  const features = extractFeatures(SAMPLE_SESSION);
  if (hasSignals(features)) {
    lines.push(`OK   signal scan: ${[...features.languages, ...features.frameworks].join(', ')}`);
  } else {
    ok = false;
    lines.push('FAIL signal scan found nothing in the sample session');
  }

  lines.push(`OK   offline suggestion: ${localSuggestion(features).title}`);
  return { ok, lines };
}

export function hooksConfig(hookScript: string): object {
  return {
    hooks: {
      Stop: [
        { hooks: [{ type: 'command', command: `node ${hookScript}`, timeout: 60 }] }
      ]
    }
  };
}

function tail(file: string, lines: number): string[] {
  if (!existsSync(file)) return [];
  return readFileSync(file, 'utf-8').split('\n').filter(Boolean).slice(-lines);
}

function main(args: string[]): void {
  const [command, ...rest] = args;
  const cooldown = () => new FileCooldownStore(CFG.HOME_DIR, loadSettings().cooldownSeconds);

  switch (command) {
    case 'status': {
      const verbose = rest.includes('-v') || rest.includes('--verbose');
      console.log(statusLines(loadSettings(), cooldown().lastSuggestion(), new Date(), verbose).join('\n'));
      break;
    }
    case 'enable':
      updateSettings({ enabled: true });
      console.log('Suggestions enabled');
      break;
    case 'disable':
      updateSettings({ enabled: false });
      console.log('Suggestions disabled');
      break;
    case 'toggle': {
      const next = updateSettings({ enabled: !loadSettings().enabled });
      console.log(`Suggestions ${next.enabled ? 'enabled' : 'disabled'}`);
      break;
    }
    case 'config': {
      const patch = parseConfigFlags(rest);
      if (Object.keys(patch).length === 0) {
        console.log(JSON.stringify(loadSettings(), null, 2));
        break;
      }
      console.log(JSON.stringify(updateSettings(patch), null, 2));
      break;
    }
    case 'logs': {
      const n = rest[0] === '-n' || rest[0] === '--lines' ? parseIntFlag(rest[0], rest[1]) : 20;
      const lines = tail(join(CFG.HOME_DIR, LOG_FILE), n);
      console.log(lines.length > 0 ? lines.join('\n') : 'No log entries yet');
      break;
    }
    case 'reset-cooldown':
      cooldown().clear();
      console.log('Cooldown cleared');
      break;
    case 'test': {
      const { ok, lines } = selfTest(loadSettings(), CFG.OPENAI_API_KEY);
      console.log([`Settings file: ${settingsPath()}`, ...lines].join('\n'));
      if (!ok) process.exitCode = 1;
      break;
    }
    case 'hooks':
      console.log(JSON.stringify(hooksConfig(resolve(__dirname, 'stopHook.js')), null, 2));
      break;
    default:
      console.log(USAGE);
      if (command && command !== 'help' && command !== '--help') process.exitCode = 1;
  }
}

if (require.main === module) {
  try {
    main(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
