import { ArticlePipelineError } from '@/lib/errors/article-errors';

export type StageResult<T> =
  | { success: true; data: T }
  | { success: false; error: ArticlePipelineError };

export type StageFailure = Extract<StageResult<never>, { success: false }>;

export function ok<T>(data: T): StageResult<T> {
  return { success: true, data };
}

export function fail<T = never>(error: ArticlePipelineError): StageResult<T> {
  return { success: false, error };
}

/**
 * Ejecuta una etapa y convierte cualquier excepción en un resultado fallido
 * con el error propio de esa etapa.
 */
export function attempt<T>(
  operation: () => Promise<T>,
  toError: (cause: unknown) => ArticlePipelineError
): Promise<StageResult<T>> {
  return Promise.resolve()
    .then(operation)
    .then(
      (data) => ok(data),
      (error: unknown) => fail<T>(toError(error))
    );
}
