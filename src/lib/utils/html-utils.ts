// Utilidades para obtener el HTML de los artículos
import axios from 'axios';
import { logDebug, logInfo } from '@/lib/utils/api-response-utils';

const BROWSER_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9,es;q=0.8',
};

/**
 * Bytes de la página junto con el charset declarado en `Content-Type`,
 * si el servidor envió alguno.
 */
export interface FetchedPage {
  body: Buffer;
  charset?: string;
}

/**
 * Extrae el parámetro charset de una cabecera `Content-Type`.
 */
export function charsetFromContentType(contentType: unknown): string | undefined {
  if (typeof contentType !== 'string') return undefined;
  const match = /charset\s*=\s*"?([^";\s]+)/i.exec(contentType);
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * Obtiene los bytes crudos de una URL.
 *
 * Sin timeout ni reintentos: axios rechaza cualquier status fuera de 2xx y
 * ese error se propaga tal cual.
 */
export async function fetchHtml(url: string): Promise<FetchedPage> {
  logInfo('fetchHtml', `Obteniendo HTML de ${url}`);

  const response = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    headers: BROWSER_HEADERS,
  });

  const body = Buffer.from(response.data);
  const charset = charsetFromContentType(response.headers['content-type']);
  logInfo('fetchHtml', `HTML obtenido: ${body.length} bytes (status ${response.status})`);
  logDebug('fetchHtml', `Charset declarado por el servidor: ${charset ?? 'ninguno'}`);

  return { body, charset };
}

export interface ArticleFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export class HttpArticleFetcher implements ArticleFetcher {
  fetch(url: string): Promise<FetchedPage> {
    return fetchHtml(url);
  }
}
