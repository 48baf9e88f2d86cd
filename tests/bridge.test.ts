import { describe, expect, it } from 'vitest';
import { BridgeError, createCaptionerBridge } from '../src/lib/bridge';

function fakeHost(status: number, body: string) {
  const calls: Array<{ url: string; method: string | undefined; body: unknown }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const requestBody = init?.body;
    calls.push({ url, method: init?.method, body: typeof requestBody === 'string' ? JSON.parse(requestBody) : null });
    return new Response(body, { status, headers: { 'content-type': 'application/json' } });
  };

  return { fetchImpl, calls };
}

describe('createCaptionerBridge', () => {
  it('posts the payload to the channel route and unwraps data', async () => {
    const { fetchImpl, calls } = fakeHost(200, JSON.stringify({ ok: true, data: { captionPath: '/data/a.txt' } }));
    const bridge = createCaptionerBridge(fetchImpl, 'http://127.0.0.1:4178');

    const result = await bridge.saveCaption({ imagePath: '/data/a.png', text: 'a cat' });

    expect(result).toEqual({ captionPath: '/data/a.txt' });
    expect(calls).toEqual([
      {
        url: 'http://127.0.0.1:4178/api/caption:save',
        method: 'POST',
        body: { imagePath: '/data/a.png', text: 'a cat' }
      }
    ]);
  });

  it('wraps single arguments into the expected payload', async () => {
    const { fetchImpl, calls } = fakeHost(200, JSON.stringify({ ok: true, data: [] }));
    const bridge = createCaptionerBridge(fetchImpl);

    await bridge.deleteTemplate('Short');
    await bridge.listDirectories('/data');
    await bridge.jobStatus();

    expect(calls.map((call) => [call.url, call.body])).toEqual([
      ['/api/templates:delete', { name: 'Short' }],
      ['/api/app:list-directories', { path: '/data' }],
      ['/api/job:status', {}]
    ]);
  });

  it('raises host errors with their code and status', async () => {
    const { fetchImpl } = fakeHost(
      409,
      JSON.stringify({ ok: false, error: { code: 'conflict', message: 'A captioning job is already running.' } })
    );
    const bridge = createCaptionerBridge(fetchImpl);

    const error = await bridge.startJob({ imagePaths: ['/data/a.png'] }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BridgeError);
    expect(error).toMatchObject({ code: 'conflict', status: 409 });
    expect(error instanceof Error ? error.message : null).toBe('A captioning job is already running.');
  });

  it('rejects responses that are not envelopes', async () => {
    const notJson = createCaptionerBridge(fakeHost(502, '<html>Bad gateway</html>').fetchImpl);
    const wrongShape = createCaptionerBridge(fakeHost(200, JSON.stringify({ settings: {} })).fetchImpl);

    await expect(notJson.getSettings()).rejects.toMatchObject({ code: 'backend', status: 502 });
    await expect(notJson.getSettings()).rejects.toThrow('Host returned 502 for settings:get');
    await expect(wrongShape.getSettings()).rejects.toThrow('Malformed response for settings:get');
  });
});
