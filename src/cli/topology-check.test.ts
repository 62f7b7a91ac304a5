/**
 * Tests for the topology-check CLI pure functions.
 */
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_COMPOSE_FILE,
  formatIssue,
  parseCliArgs,
  runTopologyCheck,
} from './topology-check.js';

// ─── ANSI helpers (match source) ────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

const DANGLING = `
services:
  api:
    depends_on:
      - db
    command: sh -c "npm run migrate && npm run start:api"
    restart: always
`;

// ─── parseCliArgs ───────────────────────────────────────────────

describe('parseCliArgs', () => {
  it('defaults to the shipped compose file', () => {
    expect(parseCliArgs([])).toEqual({ file: DEFAULT_COMPOSE_FILE, json: false });
  });

  it('parses --file and --json', () => {
    expect(parseCliArgs(['--file', 'other.yml', '--json'])).toEqual({
      file: 'other.yml',
      json: true,
    });
  });

  it('parses -f shorthand', () => {
    expect(parseCliArgs(['-f', 'other.yml']).file).toBe('other.yml');
  });

  it('ignores --file without a value', () => {
    expect(parseCliArgs(['--file']).file).toBe(DEFAULT_COMPOSE_FILE);
  });
});

// ─── formatIssue ────────────────────────────────────────────────

describe('formatIssue', () => {
  it('formats errors with their service', () => {
    expect(
      formatIssue({ severity: 'error', code: 'DANGLING_DEPENDENCY', service: 'api', message: 'gone' }),
    ).toBe(`${RED}ERROR${RESET} ${BOLD}DANGLING_DEPENDENCY${RESET} ${DIM}[api]${RESET} gone`);
  });

  it('formats deployment-wide warnings', () => {
    expect(formatIssue({ severity: 'warning', code: 'VOLUME_SHARED', message: 'shared' })).toBe(
      `${YELLOW}WARNING${RESET} ${BOLD}VOLUME_SHARED${RESET} shared`,
    );
  });
});

// ─── runTopologyCheck ───────────────────────────────────────────

describe('runTopologyCheck', () => {
  it('prints roles and startup order for a clean file', () => {
    const outcome = runTopologyCheck('services:\n  tools:\n    image: busybox\n', { json: false });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.output.split('\n')).toEqual([
      `${DIM}unknown  ${RESET} tools`,
      `${DIM}startup order:${RESET} tools`,
      '',
      `${GREEN}No issues found${RESET}`,
    ]);
  });

  it('fails with JSON issues when an error is found', () => {
    const outcome = runTopologyCheck(DANGLING, { json: true });

    expect(outcome.exitCode).toBe(1);
    expect(JSON.parse(outcome.output)).toEqual({
      issues: [
        {
          severity: 'error',
          code: 'DANGLING_DEPENDENCY',
          service: 'api',
          message: 'Service "api" depends on undeclared service "db"',
        },
      ],
    });
  });

  it('fails when the file cannot be parsed', () => {
    const outcome = runTopologyCheck('services: [', { json: false });

    expect(outcome).toEqual({
      exitCode: 1,
      output: `${RED}Compose file is not valid YAML${RESET}`,
    });
  });
});
