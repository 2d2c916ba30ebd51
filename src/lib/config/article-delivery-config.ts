// Configuración del servicio de envío de artículos
import os from 'os';
import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors/article-errors';
import { fail, ok, StageResult } from '@/lib/services/article/stage-result';

export const DEFAULT_SMTP_HOST = 'smtp.gmail.com';
export const DEFAULT_SMTP_PORT = 465;
export const DEFAULT_SUMMARIZER_MODEL = 'gpt-4';

export const MISSING_EMAIL_CONFIG_MESSAGE =
  'Email configuration is missing. Please set EMAIL_USER and EMAIL_PASSWORD in your .env file';

export interface EmailRelayConfig {
  user: string;
  password: string;
  host: string;
  port: number;
  secure: boolean;
}

export interface SummarizerConfig {
  model: string;
  apiKey?: string;
}

export interface ArticleDeliveryConfig {
  email: EmailRelayConfig;
  summarizer: SummarizerConfig;
  tmpDir: string;
}

// Variables vacías cuentan como ausentes
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const EnvSchema = z.object({
  EMAIL_USER: optionalString,
  EMAIL_PASSWORD: optionalString,
  EMAIL_HOST: optionalString,
  EMAIL_PORT: optionalString.pipe(
    z.coerce.number().int().min(1).max(65535).optional()
  ),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  ARTICLE_TMP_DIR: optionalString,
});

export type ArticleDeliveryEnv = Record<string, string | undefined>;

/**
 * Construye la configuración a partir de las variables de entorno.
 * Las credenciales del relay son obligatorias; el resto tiene valores por defecto.
 */
export function loadArticleDeliveryConfig(env: ArticleDeliveryEnv): StageResult<ArticleDeliveryConfig> {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return fail(new ConfigurationError(`Invalid configuration value for ${invalid}`, parsed.error));
  }

  const values = parsed.data;

  if (!values.EMAIL_USER || !values.EMAIL_PASSWORD) {
    return fail(new ConfigurationError(MISSING_EMAIL_CONFIG_MESSAGE));
  }

  const port = values.EMAIL_PORT ?? DEFAULT_SMTP_PORT;

  return ok({
    email: {
      user: values.EMAIL_USER,
      password: values.EMAIL_PASSWORD,
      host: values.EMAIL_HOST ?? DEFAULT_SMTP_HOST,
      port,
      secure: port === 465,
    },
    summarizer: {
      model: values.OPENAI_MODEL ?? DEFAULT_SUMMARIZER_MODEL,
      apiKey: values.OPENAI_API_KEY,
    },
    tmpDir: values.ARTICLE_TMP_DIR ?? os.tmpdir(),
  });
}
