/**
 * Jina Fetcher Tests
 * The reader API is replaced by a mocked global fetch
 */

import { JinaFetcher, JinaFetchError, extractUrlList, parseJinaResponse } from '../fetchers/jina.fetcher';

const TARGET = 'https://docs.example.com/guide/setup';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('JinaFetcher', () => {
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;
  let fetcher: JinaFetcher;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    fetchMock = jest.spyOn(globalThis, 'fetch');
    fetcher = new JinaFetcher({
      apiKey: 'test-secret',
      baseUrl: 'https://r.jina.ai/',
      timeout: 1000,
      userAgent: 'test-agent',
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return content, links, images and title', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        code: 200,
        data: {
          title: ' Setup ',
          content: '# Setup\n\nInstall it.',
          links: { Intro: 'https://docs.example.com/guide/intro' },
          images: { 'Image 1': 'https://docs.example.com/diagram.png' },
        },
      })
    );

    await expect(fetcher.fetch(TARGET)).resolves.toEqual({
      content: '# Setup\n\nInstall it.',
      links: ['https://docs.example.com/guide/intro'],
      images: ['https://docs.example.com/diagram.png'],
      title: 'Setup',
    });
  });

  it('should post the target URL with auth and summary headers', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ data: { content: 'text' } }));

    await fetcher.fetch(TARGET);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0];
    expect(input).toBe('https://r.jina.ai/');
    expect(init).toEqual(
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ url: TARGET, options: 'Markdown' }),
        headers: expect.objectContaining({
          Authorization: 'Bearer test-secret',
          'User-Agent': 'test-agent',
          'X-With-Links-Summary': 'true',
        }),
      })
    );
  });

  it('should fail on a non-OK status', async () => {
    fetchMock.mockResolvedValue(new Response('busy', { status: 503 }));

    const error = await fetcher.fetch(TARGET).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JinaFetchError);
    expect(error instanceof JinaFetchError && error.statusCode).toBe(503);
    expect(error instanceof Error && error.message).toBe(
      `Failed to fetch ${TARGET}: reader API returned 503`
    );
  });

  it('should fail on invalid JSON', async () => {
    fetchMock.mockResolvedValue(new Response('not json', { status: 200 }));

    await expect(fetcher.fetch(TARGET)).rejects.toThrow(
      `Failed to fetch ${TARGET}: reader API returned invalid JSON`
    );
  });

  it('should fail when no content comes back', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ data: { content: '   ' } }));

    await expect(fetcher.fetch(TARGET)).rejects.toThrow(`Failed to fetch ${TARGET}: no content returned`);
  });

  it('should wrap network errors', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(fetcher.fetch(TARGET)).rejects.toThrow(`Failed to fetch ${TARGET}: fetch failed`);
  });

  it('should report timeouts', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    fetchMock.mockRejectedValue(abort);

    await expect(fetcher.fetch(TARGET)).rejects.toThrow(
      `Failed to fetch ${TARGET}: timed out after 1000ms`
    );
  });

  it('should time out when the body stalls after the headers arrive', async () => {
    const stalled = new Response('{"data":', { status: 200 });
    jest.spyOn(stalled, 'json').mockReturnValue(new Promise<unknown>(() => undefined));
    fetchMock.mockResolvedValue(stalled);
    const impatient = new JinaFetcher({ apiKey: 'test-secret', timeout: 20 });

    await expect(impatient.fetch(TARGET)).rejects.toThrow(
      `Failed to fetch ${TARGET}: timed out after 20ms`
    );
  });
});

describe('parseJinaResponse', () => {
  it('should reject a body without data', () => {
    expect(() => parseJinaResponse(TARGET, { code: 422 })).toThrow(
      `Failed to fetch ${TARGET}: response has no data object`
    );
  });

  it('should leave the title unset when blank', () => {
    expect(parseJinaResponse(TARGET, { data: { content: 'x', title: ' ' } }).title).toBeUndefined();
  });
});

describe('extractUrlList', () => {
  it('should read an object of text to URL', () => {
    expect(extractUrlList({ A: 'https://a.com/1', B: 2 })).toEqual(['https://a.com/1']);
  });

  it('should read lists of pairs and plain URLs', () => {
    expect(
      extractUrlList([['Intro', 'https://a.com/intro'], ['Bad', 5], 'https://a.com/plain'])
    ).toEqual(['https://a.com/intro', 'https://a.com/plain']);
  });

  it('should return an empty list for anything else', () => {
    expect(extractUrlList(null)).toEqual([]);
    expect(extractUrlList('https://a.com')).toEqual([]);
  });
});
