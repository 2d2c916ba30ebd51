import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { charsetFromContentType, fetchHtml, HttpArticleFetcher } from '@/lib/utils/html-utils';

jest.mock('axios');

const mockedGet = jest.mocked(axios.get);

function axiosResponse(data: Buffer, headers: Record<string, string> = {}): AxiosResponse<Buffer> {
  return { data, status: 200, statusText: 'OK', headers, config: { headers: new AxiosHeaders() } };
}

describe('fetchHtml', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should return the response bytes as a Buffer', async () => {
    mockedGet.mockResolvedValue(axiosResponse(Buffer.from('<p>Hola</p>')));

    const page = await fetchHtml('https://example.com/post');

    expect(page.body).toBeInstanceOf(Buffer);
    expect(page.body.toString('utf-8')).toBe('<p>Hola</p>');
    expect(page.charset).toBeUndefined();
    expect(mockedGet).toHaveBeenCalledWith(
      'https://example.com/post',
      expect.objectContaining({ responseType: 'arraybuffer' })
    );
  });

  it('should return the charset declared in the content-type header', async () => {
    mockedGet.mockResolvedValue(
      axiosResponse(Buffer.from('<p>Hola</p>'), { 'content-type': 'text/html; charset=UTF-8' })
    );

    const page = await fetchHtml('https://example.com/post');

    expect(page.charset).toBe('utf-8');
  });

  it('should send browser-like headers', async () => {
    mockedGet.mockResolvedValue(axiosResponse(Buffer.from('')));

    await fetchHtml('https://example.com/post');

    const options = mockedGet.mock.calls[0][1];
    expect(options?.headers).toEqual(
      expect.objectContaining({ Accept: expect.stringContaining('text/html') })
    );
  });

  it('should propagate HTTP errors', async () => {
    mockedGet.mockRejectedValue(new Error('Request failed with status code 404'));

    await expect(fetchHtml('https://example.com/missing')).rejects.toThrow(
      'Request failed with status code 404'
    );
  });

  it('should be exposed through HttpArticleFetcher', async () => {
    mockedGet.mockResolvedValue(axiosResponse(Buffer.from('ok')));

    const fetcher = new HttpArticleFetcher();

    await expect(fetcher.fetch('https://example.com')).resolves.toEqual({ body: Buffer.from('ok'), charset: undefined });
  });
});

describe('charsetFromContentType', () => {
  it('should read quoted and unquoted charset parameters', () => {
    expect(charsetFromContentType('text/html; charset=ISO-8859-1')).toBe('iso-8859-1');
    expect(charsetFromContentType('text/html; charset="utf-8"; foo=bar')).toBe('utf-8');
  });

  it('should return undefined without a charset or a string header', () => {
    expect(charsetFromContentType('text/html')).toBeUndefined();
    expect(charsetFromContentType(undefined)).toBeUndefined();
  });
});
