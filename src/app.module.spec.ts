import { Test, TestingModule } from '@nestjs/testing';
import { AxiosInstance } from 'axios';
import { AppModule } from './app.module';
import { SearchCommand } from './price-lookup/search.command';
import { SEARCH_HTTP_CLIENT } from './symbol-search/symbol-search.service';
import { createCliLogger } from './common/logger/stderr-console.logger';

describe('AppModule', () => {
  const originalExitCode = process.exitCode;
  let stdout: jest.SpyInstance;
  let consoleLog: jest.SpyInstance;

  const compile = (overrideSearch?: { get: jest.Mock }) => {
    const builder = Test.createTestingModule({ imports: [AppModule] });
    if (overrideSearch) {
      builder.overrideProvider(SEARCH_HTTP_CLIENT).useValue(overrideSearch);
    }
    return builder.setLogger(createCliLogger(['error', 'warn', 'log', 'debug'])).compile();
  };

  const written = () => stdout.mock.calls.map(([chunk]) => String(chunk)).join('');

  beforeEach(() => {
    jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = originalExitCode;
  });

  it('should print only the JSON payload on stdout for --ticker --json', async () => {
    const moduleRef: TestingModule = await compile();
    const command = moduleRef.get(SearchCommand);

    await command.run([], { ticker: 'AAPL', json: true });

    expect(written()).toBe('{\n  "ticker": "AAPL",\n  "name": "AAPL",\n  "price": null,\n  "success": false\n}\n');
    expect(JSON.parse(written())).toEqual({ ticker: 'AAPL', name: 'AAPL', price: null, success: false });
    expect(consoleLog).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(0);
  }, 15000);

  it('should build the search client from the search config', async () => {
    const moduleRef: TestingModule = await compile();

    const client: AxiosInstance = moduleRef.get(SEARCH_HTTP_CLIENT);

    expect(client.defaults.timeout).toBe(10000);
  });

  it('should exit 1 with nothing on stdout when the name has no match', async () => {
    const search = { get: jest.fn().mockResolvedValue({ status: 200, data: { quotes: [] } }) };
    const moduleRef: TestingModule = await compile(search);
    const command = moduleRef.get(SearchCommand);

    await command.run([], { name: 'no such company', json: true });

    expect(search.get).toHaveBeenCalledTimes(1);
    expect(written()).toBe('');
    expect(process.exitCode).toBe(1);
  });
});
