import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, describe, expect, it, vi } from 'vitest';

import type { CliIO } from '../../api/cli/args';
import { rawConfig } from '../helpers/fixtures';

const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'spiral-logging-'));
const transcript = path.join(dir, 'chat.txt');
const markers = path.join(dir, 'markers.json');
fs.writeFileSync(transcript, 'User: Hunger, Hunger\nAI: Gemeinsam schaffen wir das\n');
fs.writeFileSync(markers, JSON.stringify(rawConfig()));

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  vi.resetModules();
});

function captureIO(): CliIO & { stdout: string[] } {
  const stdout: string[] = [];
  return {
    stdout,
    out: (line) => { stdout.push(line); },
    err: () => undefined,
  };
}

function spyConsole() {
  const quiet = () => undefined;
  return {
    log: vi.spyOn(console, 'log').mockImplementation(quiet),
    debug: vi.spyOn(console, 'debug').mockImplementation(quiet),
    info: vi.spyOn(console, 'info').mockImplementation(quiet),
    warn: vi.spyOn(console, 'warn').mockImplementation(quiet),
    error: vi.spyOn(console, 'error').mockImplementation(quiet),
  };
}

function withLoggingEnabled(): void {
  vi.stubEnv('LOG_SILENT', '0');
  vi.stubEnv('LOG_LEVEL', 'debug');
  vi.resetModules();
}

describe('CLI logging', () => {
  it('keeps analyze --json output parseable with debug logging on', async () => {
    withLoggingEnabled();
    const spies = spyConsole();
    const { runAnalyze } = await import('../../api/cli/analyze');
    const io = captureIO();

    expect(runAnalyze([transcript, '--markers', markers, '--json'], io)).toBe(0);

    expect(io.stdout).toHaveLength(1);
    expect(JSON.parse(io.stdout[0]).format).toBe('colon');
    expect(spies.log).not.toHaveBeenCalled();
    expect(spies.debug).not.toHaveBeenCalled();
    expect(spies.info).not.toHaveBeenCalled();
    expect(spies.warn).not.toHaveBeenCalled();
    expect(spies.error).toHaveBeenCalled();
  });

  it('sends validator logs to stderr', async () => {
    withLoggingEnabled();
    const spies = spyConsole();
    const { runValidate } = await import('../../api/cli/validate-markers');
    const io = captureIO();

    expect(runValidate(['--markers', markers, '--json'], io)).toBe(0);

    expect(JSON.parse(io.stdout[0]).overallStatus).toBe('healthy');
    expect(spies.info).not.toHaveBeenCalled();
    expect(spies.error).toHaveBeenCalled();
  });
});
