import { PaperExchange } from '../PaperExchange';
import { ExchangeError } from '../../utils/errors';
import { FakeExchange } from '../../__tests__/support/fakes';

const SYMBOL = 'BTC/USDT';

describe('PaperExchange', () => {
  let source: FakeExchange;
  let paper: PaperExchange;

  beforeEach(() => {
    source = new FakeExchange('kraken');
    source.price = 100;
    paper = new PaperExchange(source, 1000);
  });

  it('should pass market data through to the source', async () => {
    expect(paper.getExchangeName()).toBe('kraken');
    expect((await paper.getTicker(SYMBOL)).price).toBe(100);
  });

  it('should fill market orders at the last price without touching the source', async () => {
    const result = await paper.createOrder(SYMBOL, 'buy', 'market', 2);

    expect(result).toEqual({ orderId: 'paper-1', filledPrice: 100, filledQuantity: 2, status: 'closed' });
    expect(source.orders).toHaveLength(0);
  });

  it('should fill limit orders at their own price', async () => {
    expect((await paper.createOrder(SYMBOL, 'buy', 'limit', 1, 95)).filledPrice).toBe(95);
  });

  it('should credit realized profit on a long', async () => {
    await paper.createOrder(SYMBOL, 'buy', 'market', 2);
    source.price = 110;

    const result = await paper.closePosition(SYMBOL, 'long', 2);

    expect(result.filledPrice).toBe(110);
    expect(await paper.getBalance()).toEqual({ USDT: { free: 1020, used: 0, total: 1020 } });
  });

  it('should credit realized profit on a short', async () => {
    await paper.createOrder(SYMBOL, 'sell', 'market', 1);
    source.price = 90;

    await paper.closePosition(SYMBOL, 'short', 1);

    expect((await paper.getBalance()).USDT.total).toBe(1010);
  });

  it('should average the entry across fills on the same side', async () => {
    await paper.createOrder(SYMBOL, 'buy', 'market', 1);
    source.price = 110;
    await paper.createOrder(SYMBOL, 'buy', 'market', 1);
    source.price = 120;

    await paper.closePosition(SYMBOL, 'long', 2);

    expect((await paper.getBalance()).USDT.total).toBe(1030);
  });

  it('should keep long and short inventory apart', async () => {
    await paper.createOrder(SYMBOL, 'buy', 'market', 1);

    await expect(paper.closePosition(SYMBOL, 'short', 1)).rejects.toThrow(ExchangeError);
  });

  it('should refuse to close more than it holds', async () => {
    await paper.createOrder(SYMBOL, 'buy', 'market', 1);

    await expect(paper.closePosition(SYMBOL, 'long', 2))
      .rejects.toThrow('closePosition failed: no long inventory of 2 for BTC/USDT');
  });

  it('should reject a non-positive quantity', async () => {
    await expect(paper.createOrder(SYMBOL, 'buy', 'market', 0)).rejects.toThrow('invalid quantity 0');
  });
});
