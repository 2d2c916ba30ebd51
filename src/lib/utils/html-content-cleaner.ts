/**
 * Limpieza del HTML de un artículo antes de enviarlo al modelo
 */
import * as cheerio from 'cheerio';

/**
 * Elementos que no aportan texto visible. Se eliminan con todo su contenido.
 */
export const NON_TEXT_SELECTORS = ['style', 'script', 'img', 'path'] as const;

// Sin scripting, el contenido de <noscript> se parsea como elementos
const PARSE_OPTIONS = { scriptingEnabled: false };

/**
 * Extrae el texto plano del documento.
 *
 * Los bytes se decodifican con el charset de la cabecera HTTP si lo hay,
 * después con el BOM o el `<meta charset>` y, en último caso, como UTF-8.
 * El texto se devuelve tal cual queda tras quitar los elementos anteriores:
 * sin normalizar espacios ni conservar estructura.
 */
export function extractArticleText(html: Buffer | string, charset?: string): string {
  const $ =
    typeof html === 'string'
      ? cheerio.load(html, PARSE_OPTIONS)
      : cheerio.loadBuffer(html, {
          ...PARSE_OPTIONS,
          encoding: { transportLayerEncodingLabel: charset, defaultEncoding: 'utf-8' },
        });

  $(NON_TEXT_SELECTORS.join(', ')).remove();

  return $.root().text();
}
