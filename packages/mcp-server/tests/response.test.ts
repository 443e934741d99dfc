import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError, ConfigurationError } from '@esg-credit/engine';
import { coerceNumbers, runTool, wrapResponse } from '../src/formatters/response.js';

function bodyOf(text: string | undefined): unknown {
  return JSON.parse(text ?? 'null');
}

describe('coerceNumbers', () => {
  it('turns numeric strings into numbers at any depth', () => {
    expect(coerceNumbers({ amount: '1200.5', nested: { list: ['1', 'x', '2e3'] } }))
      .toEqual({ amount: 1200.5, nested: { list: [1, 'x', 2000] } });
  });

  it('leaves booleans, null and empty strings as strings', () => {
    expect(coerceNumbers({ a: 'true', b: 'false', c: 'null', d: '', e: '   ' }))
      .toEqual({ a: 'true', b: 'false', c: 'null', d: '', e: '   ' });
  });

  it('keeps identifier fields as strings', () => {
    expect(coerceNumbers({
      suppliers: [{ supplierId: '007', weight: '2' }],
      company: { name: '1984', industry: '2', sizeClass: '3' },
      as_of_period: '2024',
    })).toEqual({
      suppliers: [{ supplierId: '007', weight: 2 }],
      company: { name: '1984', industry: '2', sizeClass: '3' },
      as_of_period: '2024',
    });
  });
});

describe('wrapResponse', () => {
  it('serializes results as indented JSON with non-finite numbers as null', () => {
    const response = wrapResponse({ value: 1, window: NaN, edge: Infinity });
    expect(response.isError).toBeUndefined();
    expect(response.content[0].text).toBe('{\n  "value": 1,\n  "window": null,\n  "edge": null\n}');
  });

  it('reports engine errors with their subject', () => {
    const response = wrapResponse(new ValidationError('Acme: social.s1 must be numeric', 'Acme', 'social.s1'));
    expect(response.isError).toBe(true);
    expect(bodyOf(response.content[0].text)).toEqual({
      error: 'Acme: social.s1 must be numeric',
      type: 'ValidationError',
      subject: 'Acme',
    });
  });

  it('uses the setting as the subject of configuration errors', () => {
    const response = wrapResponse(new ConfigurationError('Invalid ESG_FORECAST_TREES', 'ESG_FORECAST_TREES'));
    expect(bodyOf(response.content[0].text)).toMatchObject({ type: 'ConfigurationError', subject: 'ESG_FORECAST_TREES' });
  });

  it('reports schema failures as validation errors naming the field', () => {
    const result = z.object({ amount: z.number() }).safeParse({ amount: 'lots' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const body = bodyOf(wrapResponse(result.error).content[0].text);
    expect(body).toEqual({ error: 'amount: Expected number, received string', type: 'ValidationError', subject: 'amount' });
  });

  it('passes other errors through by name', () => {
    expect(bodyOf(wrapResponse(new RangeError('too many')).content[0].text))
      .toEqual({ error: 'too many', type: 'RangeError' });
  });
});

describe('runTool', () => {
  it('wraps the value of a successful body', async () => {
    const response = await runTool(async () => ({ ok: true }));
    expect(bodyOf(response.content[0].text)).toEqual({ ok: true });
  });

  it('turns a thrown error into an error response', async () => {
    const response = await runTool(() => {
      throw new ValidationError('loan: bad amount', 'loan', 'amount');
    });
    expect(response.isError).toBe(true);
    expect(bodyOf(response.content[0].text)).toMatchObject({ type: 'ValidationError', subject: 'loan' });
  });

  it('wraps non-Error throws', async () => {
    const response = await runTool(() => {
      throw 'plain string';
    });
    expect(bodyOf(response.content[0].text)).toEqual({ error: 'plain string', type: 'Error' });
  });
});
