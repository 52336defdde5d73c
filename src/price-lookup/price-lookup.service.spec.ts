import { Test, TestingModule } from '@nestjs/testing';
import { PriceLookupService } from './price-lookup.service';
import { SymbolSearchService } from '../symbol-search/symbol-search.service';
import { MarketPriceService } from '../market-price/market-price.service';

describe('PriceLookupService', () => {
  let service: PriceLookupService;
  const symbolSearch = { resolve: jest.fn() };
  const marketPrice = { fetchPrice: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PriceLookupService,
        { provide: SymbolSearchService, useValue: symbolSearch },
        { provide: MarketPriceService, useValue: marketPrice },
      ],
    }).compile();

    service = module.get<PriceLookupService>(PriceLookupService);
  });

  describe('by ticker', () => {
    it('should use the ticker as the display name', async () => {
      marketPrice.fetchPrice.mockResolvedValue(150.1234);

      await expect(service.run({ ticker: 'AAPL' })).resolves.toEqual({
        status: 'found',
        result: { ticker: 'AAPL', name: 'AAPL', price: 150.1234, success: true },
      });
      expect(symbolSearch.resolve).not.toHaveBeenCalled();
    });

    it('should report a missing price as unsuccessful, not as an error', async () => {
      marketPrice.fetchPrice.mockResolvedValue(undefined);

      await expect(service.run({ ticker: 'ZZZZ' })).resolves.toEqual({
        status: 'found',
        result: { ticker: 'ZZZZ', name: 'ZZZZ', price: null, success: false },
      });
    });

    it('should prefer the supplied name over the ticker', async () => {
      marketPrice.fetchPrice.mockResolvedValue(10);

      const outcome = await service.run({ ticker: 'VOD.L', name: 'Vodafone' });

      expect(outcome).toEqual({
        status: 'found',
        result: { ticker: 'VOD.L', name: 'Vodafone', price: 10, success: true },
      });
      expect(symbolSearch.resolve).not.toHaveBeenCalled();
    });

    it('should return a frozen result', async () => {
      marketPrice.fetchPrice.mockResolvedValue(10);

      const outcome = await service.run({ ticker: 'VOD.L' });

      expect(outcome.status).toBe('found');
      if (outcome.status === 'found') {
        expect(Object.isFrozen(outcome.result)).toBe(true);
      }
    });
  });

  describe('by name', () => {
    it('should resolve the name then fetch the matched symbol', async () => {
      symbolSearch.resolve.mockResolvedValue({ symbol: 'BTC-USD', name: 'Bitcoin USD' });
      marketPrice.fetchPrice.mockResolvedValue(67250.5);

      await expect(service.run({ name: 'bitcoin' })).resolves.toEqual({
        status: 'found',
        result: { ticker: 'BTC-USD', name: 'Bitcoin USD', price: 67250.5, success: true },
      });
      expect(marketPrice.fetchPrice).toHaveBeenCalledWith('BTC-USD');
    });

    it('should fall back to the supplied name when the match name is empty', async () => {
      symbolSearch.resolve.mockResolvedValue({ symbol: 'XYZ', name: '' });
      marketPrice.fetchPrice.mockResolvedValue(1.5);

      const outcome = await service.run({ name: 'xyz corp' });

      expect(outcome).toEqual({
        status: 'found',
        result: { ticker: 'XYZ', name: 'xyz corp', price: 1.5, success: true },
      });
    });

    it('should stop before fetching a price when nothing matches', async () => {
      symbolSearch.resolve.mockResolvedValue(undefined);

      await expect(service.run({ name: 'no such company' })).resolves.toEqual({
        status: 'not-found',
        name: 'no such company',
      });
      expect(marketPrice.fetchPrice).not.toHaveBeenCalled();
    });
  });

  it('should reject a query with neither ticker nor name', async () => {
    await expect(service.run({})).rejects.toThrow('A ticker or a name is required');
    expect(marketPrice.fetchPrice).not.toHaveBeenCalled();
  });
});
