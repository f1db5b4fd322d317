import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command } from 'commander';
import { registerHandlerCommands } from '../src/cli/commands';
import * as logger from '../src/output/logger';

const STUB_WARNING = 'LLM_PROVIDER is stub; reports are answered with canned text.';

function buildProgram(): Command {
  const program = new Command();
  program.option('-v, --verbose', 'Enable verbose logging');
  registerHandlerCommands(program);
  return program;
}

describe('one-shot commands', () => {
  afterEach(() => {
    logger.setSilentMode(false);
    logger.setVerboseMode(false);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('prints only the handler text on stdout', async () => {
    vi.stubEnv('LLM_PROVIDER', 'stub');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await buildProgram().parseAsync(['weather', 'lisbon'], { from: 'user' });

    expect(warnSpy).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0]?.[0]).split('\n')[0]).toBe('🌦️ Weather Prediction for Lisbon');
  });

  it('keeps diagnostics when verbose', async () => {
    vi.stubEnv('LLM_PROVIDER', 'stub');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await buildProgram().parseAsync(['-v', 'weather', 'lisbon'], { from: 'user' });

    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('Warning:'), STUB_WARNING);
  });
});
