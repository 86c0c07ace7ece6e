import { describe, expect, it, vi } from 'vitest';
import { VerificationClient, VerificationRequestError } from '../src/client.js';

const createFetch = (handlers: Record<string, (init?: RequestInit) => Promise<Response>>) => {
  return vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${url.toString()}`;
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler(init);
  });
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('VerificationClient', () => {
  it('posts bed photos and returns the verdict', async () => {
    const fetchMock = createFetch({
      'POST https://gateway.test/verifyBed': async (init) => {
        expect(JSON.parse(String(init?.body))).toEqual({ imageBase64: 'YmVk' });
        return json({ is_made: true, detected_subject: 'bed', feedback: 'Looks great!' });
      },
    });

    const client = new VerificationClient({ baseUrl: 'https://gateway.test/', fetchImpl: fetchMock });
    const result = await client.verifyBed('YmVk');

    expect(result).toEqual({ is_made: true, detected_subject: 'bed', feedback: 'Looks great!' });
    expect(fetchMock).toHaveBeenCalledWith('https://gateway.test/verifyBed', expect.any(Object));
  });

  it('sends custom habit fields as given', async () => {
    const fetchMock = createFetch({
      'POST https://gateway.test/verifyCustomHabit': async (init) => {
        expect(JSON.parse(String(init?.body))).toEqual({
          imageBase64: 'aW1n',
          habitName: 'Call mom',
          allowsScreenshots: true,
        });
        return json({ is_verified: true, detected_subject: 'call log', feedback: 'Nice call!' });
      },
    });

    const client = new VerificationClient({ baseUrl: 'https://gateway.test', fetchImpl: fetchMock });
    const result = await client.verifyCustomHabit({ imageBase64: 'aW1n', habitName: 'Call mom', allowsScreenshots: true });

    expect(result.is_verified).toBe(true);
  });

  it('posts predefined habit types', async () => {
    const fetchMock = createFetch({
      'POST https://gateway.test/verifyPredefinedHabit': async (init) => {
        expect(JSON.parse(String(init?.body))).toEqual({ imageBase64: 'aW1n', habitType: 'vitamins' });
        return json({ is_verified: false, detected_subject: 'other', feedback: 'Where are your vitamins?' });
      },
    });

    const client = new VerificationClient({ baseUrl: 'https://gateway.test', fetchImpl: fetchMock });

    await expect(client.verifyPredefinedHabit('aW1n', 'vitamins')).resolves.toEqual({
      is_verified: false,
      detected_subject: 'other',
      feedback: 'Where are your vitamins?',
    });
  });

  it('surfaces the server error message', async () => {
    const fetchMock = createFetch({
      'POST https://gateway.test/verifySunlight': async () => json({ error: 'Verification failed' }, 500),
    });

    const client = new VerificationClient({ baseUrl: 'https://gateway.test', fetchImpl: fetchMock });
    const error = await client.verifySunlight('aW1n').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(VerificationRequestError);
    expect(error instanceof VerificationRequestError ? [error.status, error.message] : []).toEqual([
      500,
      'verifySunlight failed with 500: Verification failed',
    ]);
  });

  it('falls back to the raw body for non-JSON errors', async () => {
    const fetchMock = createFetch({
      'POST https://gateway.test/verifyHydration': async () => new Response('bad gateway', { status: 502 }),
    });

    const client = new VerificationClient({ baseUrl: 'https://gateway.test', fetchImpl: fetchMock });

    await expect(client.verifyHydration('aW1n')).rejects.toThrow('verifyHydration failed with 502: bad gateway');
  });

  it('refuses empty videos before sending', async () => {
    const fetchMock = createFetch({});
    const client = new VerificationClient({ baseUrl: 'https://gateway.test', fetchImpl: fetchMock });

    await expect(client.verifyVideo({ frames: [], habitName: 'pushups' })).rejects.toThrow(
      'at least one frame is required',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('requires a base url', () => {
    expect(() => new VerificationClient({ baseUrl: '' })).toThrow('baseUrl is required');
  });
});
