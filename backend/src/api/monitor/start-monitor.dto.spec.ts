import { ArgumentMetadata, BadRequestException, ValidationPipe } from '@nestjs/common';
import { StartMonitorDto } from './start-monitor.dto';

describe('StartMonitorDto', () => {
  const pipe = new ValidationPipe({ whitelist: true, transform: true, forbidNonWhitelisted: true });
  const metadata: ArgumentMetadata = { type: 'body', metatype: StartMonitorDto, data: '' };

  async function rejectionMessages(body: unknown): Promise<string[]> {
    try {
      await pipe.transform(body, metadata);
    } catch (error) {
      if (error instanceof BadRequestException) {
        const response = error.getResponse();
        if (typeof response === 'object' && 'message' in response && Array.isArray(response.message)) {
          return response.message.map(String);
        }
      }
      throw error;
    }
    return [];
  }

  it('treats a missing body as no overrides', async () => {
    await expect(pipe.transform(undefined, metadata)).resolves.toEqual({});
  });

  it('converts typed values and comma-separated pairs', async () => {
    const dto: unknown = await pipe.transform(
      {
        initialAmount: 5000,
        initialCurrency: 'EUR',
        intervalSeconds: '30',
        pairs: 'EUR/USD, EUR/GBP',
        autoTrade: 'false',
        seriesSource: 'intraday',
        intradayInterval: '15min',
      },
      metadata,
    );

    expect(dto).toBeInstanceOf(StartMonitorDto);
    expect(dto).toEqual({
      initialAmount: 5000,
      initialCurrency: 'EUR',
      intervalSeconds: 30,
      pairs: ['EUR/USD', 'EUR/GBP'],
      autoTrade: false,
      seriesSource: 'intraday',
      intradayInterval: '15min',
    });
  });

  it('trims pairs given as an array', async () => {
    await expect(pipe.transform({ pairs: ['USD/JPY', ' AUD/USD '] }, metadata)).resolves.toEqual({
      pairs: ['USD/JPY', 'AUD/USD'],
    });
  });

  it('rejects unknown fields and wrongly typed values', async () => {
    const messages = await rejectionMessages({ initialAmount: 'lots', pairs: 42, leverage: 10, intradayInterval: '2min' });

    expect(messages).toEqual(
      expect.arrayContaining([
        'property leverage should not exist',
        'initialAmount must be a number conforming to the specified constraints',
        'pairs must be an array',
      ]),
    );
    expect(messages.some((m) => m.startsWith('intradayInterval must be one of the following values'))).toBe(true);
  });

  it('accepts an empty object', async () => {
    await expect(rejectionMessages({})).resolves.toEqual([]);
  });
});
