import { afterEach, describe, expect, it, vi } from 'vitest';
import { createSignalHandler, main, parseOptions } from './cli.js';
import { loadConfig } from './schemas/config.js';

describe('parseOptions', () => {
  it('maps flags to option names', () => {
    const options = parseOptions(
      ['10.0.0.0/24', '-p', '22,80', '-X', '135-139', '-x', '10.0.0.96/28', '-T', '5', '-t', '0.5', '-scdv', '--loop-open'],
      'user'
    );

    expect(options).toMatchObject({
      target: '10.0.0.0/24',
      ports: '22,80',
      skipPorts: '135-139',
      skipNetwork: '10.0.0.96/28',
      threads: '5',
      timeout: '0.5',
      shuffleHosts: true,
      closed: true,
      dns: true,
      verbose: true,
      loopOpen: true,
      logLevel: 'warn',
    });
  });

  it('defaults the target to the local host', () => {
    expect(parseOptions([], 'user')).toMatchObject({ target: '127.0.0.1', threads: '100' });
  });

  it('produces options the config loader accepts', () => {
    const config = loadConfig(parseOptions(['192.168.1.1', '-l', '0', '-S', '-r', '10', '-o', 'scan.csv'], 'user'));

    expect(config).toMatchObject({
      target: '192.168.1.1',
      loop: { kind: 'continuous' },
      shufflePorts: true,
      runtimeStatsSeconds: 10,
      outputFile: 'scan.csv',
    });
  });
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports an invalid port specification', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(main(['node', 'tcpsweep', '10.0.0.1', '-p', '0'])).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith('Error: Invalid port specification "0": port 0 is outside 1-65535');
  });

  it('reports conflicting options', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(main(['node', 'tcpsweep', '--loop-open', '--loop-closed'])).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith('Error: loopOpen: --loop-open and --loop-closed cannot be combined');
  });
});

describe('createSignalHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('aborts on the first signal and exits with 130 on the second', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const controller = new AbortController();
    const exit = vi.fn();
    const onSignal = createSignalHandler(controller, exit);

    onSignal();
    expect(controller.signal.aborted).toBe(true);
    expect(exit).not.toHaveBeenCalled();

    onSignal();
    expect(exit).toHaveBeenCalledWith(130);
  });
});
