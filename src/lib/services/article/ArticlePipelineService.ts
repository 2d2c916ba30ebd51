import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ArticleDeliveryConfig } from '@/lib/config/article-delivery-config';
import {
  DeliveryError,
  describeError,
  FetchError,
  RenderError,
  SummarizationError,
} from '@/lib/errors/article-errors';
import { ArticleFetcher, HttpArticleFetcher } from '@/lib/utils/html-utils';
import { extractArticleText } from '@/lib/utils/html-content-cleaner';
import { logDebug, logError, logInfo, logWarning } from '@/lib/utils/api-response-utils';
import { ArticleRequest } from '@/lib/validators/ArticleRequestValidator';
import { ArticleMailer, EmailSendService } from '@/lib/services/email/EmailSendService';
import { ArticlePdfService, DocumentRenderer } from './ArticlePdfService';
import { ArticleSummarizer, ArticleSummarizerService } from './ArticleSummarizerService';
import { attempt, ok, StageFailure, StageResult } from './stage-result';

const SERVICE = 'ArticlePipeline';

export const ARTICLE_EMAIL_BODY = 'Please find the attached article.';
export const ARTICLE_SENT_MESSAGE = 'Article has been processed and sent to your email!';

export interface ArticlePipelineDependencies {
  fetcher: ArticleFetcher;
  summarizer: ArticleSummarizer;
  renderer: DocumentRenderer;
  mailer: ArticleMailer;
}

export interface ArticleDeliveryResult {
  url: string;
  recipient: string;
  subject: string;
  messageId: string;
  contentLength: number;
}

export function articleEmailSubject(url: string): string {
  return `Article from ${url}`;
}

/**
 * Coordina fetch → limpieza → resumen → PDF → email para una petición.
 *
 * Cada etapa devuelve un StageResult y la primera que falla corta el flujo.
 * El PDF temporal se borra siempre que se haya llegado a generarlo.
 */
export class ArticlePipelineService {
  constructor(
    private readonly config: ArticleDeliveryConfig,
    private readonly deps: ArticlePipelineDependencies
  ) {}

  async process(request: ArticleRequest): Promise<StageResult<ArticleDeliveryResult>> {
    const { url, email } = request;
    logInfo(SERVICE, `Procesando artículo ${url} para ${email}`);

    const page = await attempt(
      () => this.deps.fetcher.fetch(url),
      (cause) => new FetchError(`Failed to fetch article: ${describeError(cause)}`, cause)
    );
    if (!page.success) return this.failed(page);

    // La limpieza es local; un fallo del parser se trata como fallo de contenido
    const text = await attempt(
      async () => extractArticleText(page.data.body, page.data.charset),
      (cause) => new SummarizationError(`Failed to process article content: ${describeError(cause)}`, cause)
    );
    if (!text.success) return this.failed(text);
    logInfo(SERVICE, `Texto extraído: ${text.data.length} caracteres`);
    logDebug(SERVICE, `Charset usado: ${page.data.charset ?? 'detectado en el documento'}`);

    const content = await attempt(
      () => this.deps.summarizer.summarize(text.data),
      (cause) => new SummarizationError(`Failed to process article content: ${describeError(cause)}`, cause)
    );
    if (!content.success) return this.failed(content);

    logDebug(SERVICE, `Contenido formateado: ${content.data.length} caracteres`);

    const pdfPath = this.createTempPdfPath();
    logDebug(SERVICE, `PDF temporal: ${pdfPath}`);
    try {
      return await this.renderAndSend(request, content.data, pdfPath);
    } finally {
      await this.removeTempFile(pdfPath);
    }
  }

  private async renderAndSend(
    request: ArticleRequest,
    content: string,
    pdfPath: string
  ): Promise<StageResult<ArticleDeliveryResult>> {
    const subject = articleEmailSubject(request.url);

    const rendered = await attempt(
      () => this.deps.renderer.render(content, pdfPath),
      (cause) => new RenderError(`Failed to process or send article: ${describeError(cause)}`, cause)
    );
    if (!rendered.success) return this.failed(rendered);
    logDebug(SERVICE, `PDF generado en ${pdfPath}`);

    const sent = await attempt(
      () =>
        this.deps.mailer.send({
          to: request.email,
          subject,
          text: ARTICLE_EMAIL_BODY,
          pdfPath,
        }),
      (cause) => new DeliveryError(`Failed to process or send article: ${describeError(cause)}`, cause)
    );
    if (!sent.success) return this.failed(sent);

    logInfo(SERVICE, `Artículo enviado a ${request.email} (messageId ${sent.data.messageId})`);

    return ok({
      url: request.url,
      recipient: request.email,
      subject,
      messageId: sent.data.messageId,
      contentLength: content.length,
    });
  }

  private createTempPdfPath(): string {
    return path.join(this.config.tmpDir, `article-${uuidv4()}.pdf`);
  }

  // Nunca lanza: un fallo al borrar no debe ocultar el resultado del pipeline
  private async removeTempFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      logWarning(SERVICE, `No se pudo eliminar el PDF temporal ${filePath}:`, error);
    }
  }

  private failed(result: StageFailure): StageResult<ArticleDeliveryResult> {
    logError(SERVICE, `${result.error.code}: ${result.error.message}`);
    return result;
  }
}

/**
 * Pipeline con los servicios reales (axios, OpenAI, pdfkit, nodemailer)
 */
export function createArticlePipeline(config: ArticleDeliveryConfig): ArticlePipelineService {
  return new ArticlePipelineService(config, {
    fetcher: new HttpArticleFetcher(),
    summarizer: new ArticleSummarizerService(config.summarizer),
    renderer: new ArticlePdfService(),
    mailer: new EmailSendService(config.email),
  });
}
