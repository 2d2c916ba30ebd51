/**
 * Errores del pipeline de artículos
 *
 * Cada tipo de error conoce su código y el status HTTP con el que se
 * responde al cliente.
 */

export type ArticleErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'FETCH_ERROR'
  | 'SUMMARIZATION_ERROR'
  | 'RENDER_ERROR'
  | 'DELIVERY_ERROR';

export interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

export abstract class ArticlePipelineError extends Error {
  abstract readonly code: ArticleErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class ValidationError extends ArticlePipelineError {
  readonly code = 'VALIDATION_ERROR';
  readonly httpStatus = 422;

  constructor(readonly issues: ValidationIssue[]) {
    super(issues.map((issue) => `${issue.loc.join('.')}: ${issue.msg}`).join('; '));
  }
}

export class ConfigurationError extends ArticlePipelineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly httpStatus = 500;
}

export class FetchError extends ArticlePipelineError {
  readonly code = 'FETCH_ERROR';
  readonly httpStatus = 400;
}

export class SummarizationError extends ArticlePipelineError {
  readonly code = 'SUMMARIZATION_ERROR';
  readonly httpStatus = 500;
}

export class RenderError extends ArticlePipelineError {
  readonly code = 'RENDER_ERROR';
  readonly httpStatus = 500;
}

export class DeliveryError extends ArticlePipelineError {
  readonly code = 'DELIVERY_ERROR';
  readonly httpStatus = 500;
}

/**
 * Mensaje legible de cualquier valor lanzado
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
