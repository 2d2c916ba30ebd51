import { NextRequest, NextResponse } from 'next/server';
import { loadArticleDeliveryConfig } from '@/lib/config/article-delivery-config';
import { ARTICLE_SENT_MESSAGE, createArticlePipeline } from '@/lib/services/article/ArticlePipelineService';
import { createErrorResponse, logError, logInfo, logWarning } from '@/lib/utils/api-response-utils';
import { invalidJsonBodyError, validateArticleRequest } from '@/lib/validators/ArticleRequestValidator';

export const runtime = 'nodejs';

/**
 * POST /api/process-article (también /process-article)
 *
 * Descarga el artículo, lo limpia con el modelo, genera el PDF y lo envía
 * por email. Responde cuando el email ya se ha enviado o la petición ha fallado.
 */
export async function POST(request: NextRequest) {
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch (parseError) {
      logWarning('process-article', 'Cuerpo de la petición no es JSON válido:', parseError);
      return createErrorResponse(invalidJsonBodyError());
    }

    const validated = validateArticleRequest(body);
    if (!validated.success) {
      logWarning('process-article', `Petición inválida: ${validated.error.message}`);
      return createErrorResponse(validated.error);
    }

    // Las credenciales se comprueban antes de cualquier trabajo de red
    const config = loadArticleDeliveryConfig(process.env);
    if (!config.success) {
      logError('process-article', 'Configuración incompleta:', config.error.message);
      return createErrorResponse(config.error);
    }

    const result = await createArticlePipeline(config.data).process(validated.data);
    if (!result.success) {
      return createErrorResponse(result.error);
    }

    logInfo('process-article', `Artículo ${result.data.url} enviado a ${result.data.recipient}`);
    return NextResponse.json({ message: ARTICLE_SENT_MESSAGE });
  } catch (error) {
    logError('process-article', 'Error inesperado:', error);
    return NextResponse.json({ detail: 'Internal server error' }, { status: 500 });
  }
}
