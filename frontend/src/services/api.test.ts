import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiClient, ApiError } from './api.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('ApiClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches a form definition', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, data: { formId: 'contact', fields: [] } }));
    const res = await new ApiClient().getForm('contact');
    expect(res).toEqual({ formId: 'contact', fields: [] });
    expect(fetchMock).toHaveBeenCalledWith('/form/contact', expect.objectContaining({ method: 'GET' }));
  });

  it('posts the submission as JSON', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, data: { formId: 'contact', data: {} } }));
    await new ApiClient().submitForm('contact', { IDa: 'x' });
    expect(fetchMock).toHaveBeenCalledWith('/form/contact', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"IDa":"x"}',
    });
  });

  it('throws an ApiError carrying the status code', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'Forbidden', statusCode: 403 }, 403));
    const err = await new ApiClient().submitForm('contact', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ message: 'Forbidden', statusCode: 403 });
  });
});
