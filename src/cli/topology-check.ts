/**
 * Deployment topology checker.
 *
 * Parses a compose file, runs every topology check and prints the issues.
 * Exits 1 when any issue is an error.
 *
 * Usage: npm run topology:check -- [--file <path>] [--json]
 */
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { toError } from '@/core/errors.js';
import type { Topology, TopologyIssue } from '@/topology/index.js';
import {
  checkTopology,
  hasErrors,
  parseComposeFile,
  planStartupOrder,
} from '@/topology/index.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

export const DEFAULT_COMPOSE_FILE = 'deploy/docker-compose.yml';

// ─── CLI Arg Parsing ────────────────────────────────────────────

interface CliArgs {
  file: string;
  json: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { file: DEFAULT_COMPOSE_FILE, json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--file' || arg === '-f') && next) {
      args.file = next;
      i++;
    } else if (arg === '--json') {
      args.json = true;
    }
  }

  return args;
}

// ─── Formatting ─────────────────────────────────────────────────

export function formatIssue(issue: TopologyIssue): string {
  const color = issue.severity === 'error' ? RED : YELLOW;
  const where = issue.service ? ` ${DIM}[${issue.service}]${RESET}` : '';
  return `${color}${issue.severity.toUpperCase()}${RESET} ${BOLD}${issue.code}${RESET}${where} ${issue.message}`;
}

export function formatReport(topology: Topology, issues: TopologyIssue[]): string {
  const lines: string[] = [];
  for (const service of topology.services) {
    lines.push(`${DIM}${service.role.padEnd(9)}${RESET} ${service.name}`);
  }

  const order = planStartupOrder(topology);
  if (order.ok) {
    lines.push(`${DIM}startup order:${RESET} ${order.value.join(' → ')}`);
  }

  lines.push('');
  if (issues.length === 0) {
    lines.push(`${GREEN}No issues found${RESET}`);
  } else {
    lines.push(...issues.map(formatIssue));
  }
  return lines.join('\n');
}

// ─── Run ────────────────────────────────────────────────────────

export interface CheckOutcome {
  exitCode: 0 | 1;
  output: string;
}

/** Check the compose document text and describe the outcome. */
export function runTopologyCheck(text: string, options: { json: boolean }): CheckOutcome {
  const parsed = parseComposeFile(text);
  if (!parsed.ok) {
    const output = options.json
      ? JSON.stringify({ error: parsed.error.message, context: parsed.error.context ?? {} })
      : `${RED}${parsed.error.message}${RESET}`;
    return { exitCode: 1, output };
  }

  const issues = checkTopology(parsed.value);
  const output = options.json
    ? JSON.stringify({ issues }, null, 2)
    : formatReport(parsed.value, issues);
  return { exitCode: hasErrors(issues) ? 1 : 0, output };
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  let text: string;
  try {
    text = await readFile(args.file, 'utf-8');
  } catch (error) {
    console.error(`${RED}Cannot read ${args.file}: ${toError(error).message}${RESET}`);
    process.exit(1);
  }

  const outcome = runTopologyCheck(text, { json: args.json });
  console.log(outcome.output);
  process.exit(outcome.exitCode);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error(`${RED}Topology check failed: ${toError(e).message}${RESET}`);
    process.exit(1);
  });
}
