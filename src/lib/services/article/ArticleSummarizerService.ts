import OpenAI from 'openai';
import { SummarizerConfig } from '@/lib/config/article-delivery-config';
import { logInfo } from '@/lib/utils/api-response-utils';

export const ARTICLE_CLEANUP_INSTRUCTIONS = `
I am going to pass you text from an article's website that was cleaned a little with an HTML parser.
Return only the article content and title in a clean format, clean any remaining HTML or anything else that doesn't belong.
If the article seems to be locked behind a login, report that the content can't be accessed instead of making it up.
`;

export interface ArticleSummarizer {
  summarize(text: string): Promise<string>;
}

/**
 * Reformatea el texto extraído con la Responses API de OpenAI.
 * La respuesta se devuelve tal cual, sin esquema ni caché.
 */
export class ArticleSummarizerService implements ArticleSummarizer {
  private client: OpenAI | null = null;

  constructor(private readonly config: SummarizerConfig) {}

  async summarize(text: string): Promise<string> {
    logInfo('ArticleSummarizer', `Enviando ${text.length} caracteres al modelo ${this.config.model}`);

    const response = await this.getClient().responses.create({
      model: this.config.model,
      instructions: ARTICLE_CLEANUP_INSTRUCTIONS,
      input: text,
    });

    logInfo('ArticleSummarizer', `Respuesta recibida: ${response.output_text.length} caracteres`);
    return response.output_text;
  }

  // El cliente se crea en la primera llamada para que una API key ausente
  // falle dentro de la etapa de resumen
  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.config.apiKey, maxRetries: 0 });
    }
    return this.client;
  }
}
