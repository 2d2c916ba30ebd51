/**
 * Utilidades para el manejo de logs y respuestas de API
 */
import { NextResponse } from 'next/server';
import { ArticlePipelineError, ValidationError, ValidationIssue } from '@/lib/errors/article-errors';

/**
 * Log de información
 */
export function logInfo(service: string, message: string, ...args: unknown[]): void {
  console.log(`[${service}] ${message}`, ...args);
}

/**
 * Log de errores
 */
export function logError(service: string, message: string, error?: unknown): void {
  console.error(`[${service}] ${message}`, error ?? '');
}

/**
 * Log de advertencias
 */
export function logWarning(service: string, message: string, ...args: unknown[]): void {
  console.warn(`[${service}] ${message}`, ...args);
}

/**
 * Log de depuración
 */
export function logDebug(service: string, message: string, ...args: unknown[]): void {
  if (process.env.NODE_ENV === 'development') {
    console.debug(`[${service}] ${message}`, ...args);
  }
}

export interface ErrorResponseBody {
  detail: string | ValidationIssue[];
}

/**
 * Convierte un error del pipeline en la respuesta JSON que ve el cliente.
 * Los errores de validación devuelven la lista de problemas; el resto un
 * mensaje.
 */
export function createErrorResponse(error: ArticlePipelineError): NextResponse<ErrorResponseBody> {
  const detail = error instanceof ValidationError ? error.issues : error.message;

  return NextResponse.json(
    { detail },
    {
      status: error.httpStatus,
      headers: { 'X-Error-Code': error.code },
    }
  );
}
