import { describe, it, expect, vi } from 'vitest';
import type { IConfigComponent, ILoggerComponent } from '@well-known-components/interfaces';
import { createConfigComponent } from '@well-known-components/env-config-provider';
import { runCli } from '../src/index.js';

function createLoggerMock(): ILoggerComponent.ILogger {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('runCli', () => {
  it('should print help and succeed', async () => {
    const logger = createLoggerMock();
    const write = vi.fn();

    const code = await runCli('demo', ['--help'], { config: createConfigComponent({}), logger }, write);

    expect(code).toBe(0);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toContain('  demo --help\n');
  });

  it('should print the report for a run', async () => {
    const logger = createLoggerMock();
    const write = vi.fn();

    const code = await runCli(
      'demo',
      ['10', '50', '50', '3'],
      { config: createConfigComponent({}), logger },
      write
    );

    expect(code).toBe(0);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toMatch(/^\[Test setting\]\nThe number of entries {9}: 50\n/);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should log configuration failures and exit with 1', async () => {
    const logger = createLoggerMock();
    const write = vi.fn();
    const failure = new Error('BLOOM_NUM_ENTRIES is not a number');
    const config: IConfigComponent = {
      getString: vi.fn().mockResolvedValue(undefined),
      getNumber: vi.fn().mockRejectedValue(failure),
      requireString: vi.fn().mockRejectedValue(failure),
      requireNumber: vi.fn().mockRejectedValue(failure),
    };

    const code = await runCli('demo', [], { config, logger }, write);

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(failure);
    expect(write).not.toHaveBeenCalled();
  });

  it('should log a fatal size error and exit with 1', async () => {
    const logger = createLoggerMock();
    const write = vi.fn();

    const code = await runCli(
      'demo',
      ['34', '8', '8', '1'],
      { config: createConfigComponent({}), logger },
      write
    );

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(new Error('Failed to set the size of the filter'));
    expect(write).not.toHaveBeenCalled();
  });
});
