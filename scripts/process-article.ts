#!/usr/bin/env tsx

/**
 * Procesa un artículo desde la línea de comandos con el mismo pipeline que
 * el endpoint POST /process-article.
 *
 * Uso:
 * ```
 * npm run process-article -- https://example.com/post reader@example.com
 * ```
 */

import dotenv from 'dotenv';
import path from 'path';
import { loadArticleDeliveryConfig } from '../src/lib/config/article-delivery-config';
import { createArticlePipeline } from '../src/lib/services/article/ArticlePipelineService';
import { validateArticleRequest } from '../src/lib/validators/ArticleRequestValidator';

type Env = Record<string, string | undefined>;

/**
 * Devuelve el código de salida: 0 si el artículo se envió, 1 en cualquier
 * otro caso.
 */
export async function main(argv: string[], env: Env = process.env): Promise<number> {
  const [url, email] = argv;

  if (!url || !email) {
    console.error('Uso: npm run process-article -- <url> <email>');
    return 1;
  }

  const request = validateArticleRequest({ url, email });
  if (!request.success) {
    console.error('❌ Petición inválida:', request.error.message);
    return 1;
  }

  const config = loadArticleDeliveryConfig(env);
  if (!config.success) {
    console.error('❌', config.error.message);
    return 1;
  }

  console.log(`🚀 Procesando ${url}...`);
  const result = await createArticlePipeline(config.data).process(request.data);

  if (!result.success) {
    console.error(`❌ ${result.error.code}: ${result.error.message}`);
    return 1;
  }

  console.log('✅ Artículo enviado:', result.data);
  return 0;
}

if (require.main === module) {
  // Cargar variables de entorno
  dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });

  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      console.error('Error inesperado:', error);
      process.exitCode = 1;
    });
}
