/**
 * TESTS FOR PRODUCTION EFFECTS
 *
 * Config parsing, log filtering and the readline terminal, driven over
 * in-memory streams instead of a real tty.
 */

import {createConsoleLogger, loadConfigFromEnv, makeAppEffects} from '../effects/EffectsFactory';
import {CliConfig} from '../effects/types';
import {runMenu} from '../cli/menu';
import {makeProduct} from '../pure/products';
import {Store} from '../store/Store';
import {PassThrough} from 'stream';

describe('loadConfigFromEnv', () => {
  it('falls back to defaults', () => {
    expect(loadConfigFromEnv({})).toEqual({
      storeName: 'Store Management System',
      logLevel: 'warn',
    });
  });

  it('reads the store name and log level', () => {
    expect(loadConfigFromEnv({STORE_NAME: ' Corner Shop ', LOG_LEVEL: 'DEBUG'})).toEqual({
      storeName: 'Corner Shop',
      logLevel: 'debug',
    });
  });

  it('ignores unknown log levels and blank names', () => {
    expect(loadConfigFromEnv({STORE_NAME: '  ', LOG_LEVEL: 'verbose'})).toEqual({
      storeName: 'Store Management System',
      logLevel: 'warn',
    });
    expect(loadConfigFromEnv({LOG_LEVEL: 'constructor'}).logLevel).toBe('warn');
  });
});

describe('console logger', () => {
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('drops messages below its level', () => {
    const logger = createConsoleLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('Low stock');

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError).toHaveBeenCalledWith('⚠️ Low stock');
  });

  it('passes the cause along with errors', () => {
    const logger = createConsoleLogger('error');
    const cause = new Error('boom');

    logger.error('Seeding failed', cause);

    expect(consoleError).toHaveBeenCalledWith('❌ Seeding failed', cause);
  });
});

describe('readline terminal', () => {
  const config: CliConfig = {storeName: 'Test Store', logLevel: 'error'};

  it('answers a prompt with the next input line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const {terminal} = makeAppEffects(config, input, output);

    const answer = terminal.prompt('> ');
    input.write('1 5\n');

    expect((await answer).extract()).toBe('1 5');
    terminal.close();
  });

  it('keeps every line of a chunk for later prompts', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const {terminal} = makeAppEffects(config, input, output);

    input.write('1\n4\n');
    const first = await terminal.prompt('> ');
    const second = await terminal.prompt('> ');

    expect([first.extract(), second.extract()]).toEqual(['1', '4']);
    terminal.close();
  });

  it('runs a whole piped session through the menu', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const appEffects = makeAppEffects(config, input, output);
    const store = new Store([makeProduct('Widget', 10, 5).unsafeCoerce()]);

    input.end('3\n1 2\ndone\n4\n');
    await runMenu(store, {storeName: config.storeName})(appEffects);

    expect(store.totalQuantity()).toBe(3);
    expect(String(output.read())).toMatch(/Order completed! Total price: 20\.00\n[\s\S]*Thank you for using the Test Store!\n$/);
    appEffects.terminal.close();
  });

  it('answers Nothing once input ends', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const {terminal} = makeAppEffects(config, input, output);

    const answer = terminal.prompt('> ');
    input.end();

    expect((await answer).isNothing()).toBe(true);
    expect((await terminal.prompt('> ')).isNothing()).toBe(true);
  });

  it('prints one line per call', () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const {terminal} = makeAppEffects(config, input, output);

    terminal.print('hello');

    expect(String(output.read())).toBe('hello\n');
    terminal.close();
  });
});
