import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';

const ALLOWED_METHODS = 'GET, POST, PUT, PATCH, DELETE, OPTIONS';
const DEFAULT_ALLOWED_HEADERS = 'Content-Type, Authorization';

/**
 * Middleware CORS: cualquier origen, método y cabecera
 */
export function middleware(request: NextRequest) {
  const origin = request.headers.get('origin');

  // Para solicitudes preflight OPTIONS
  if (request.method === 'OPTIONS') {
    const response = new NextResponse(null, { status: 204 });
    applyCorsHeaders(
      response,
      origin,
      request.headers.get('access-control-request-headers') || DEFAULT_ALLOWED_HEADERS
    );
    response.headers.set('Access-Control-Max-Age', '600');
    return response;
  }

  const response = NextResponse.next();
  if (origin) {
    applyCorsHeaders(response, origin, DEFAULT_ALLOWED_HEADERS);
  }
  return response;
}

function applyCorsHeaders(response: NextResponse, origin: string | null, allowedHeaders: string): void {
  // Con credenciales el navegador no acepta '*', se refleja el origen
  response.headers.set('Access-Control-Allow-Origin', origin || '*');
  if (origin) {
    response.headers.set('Access-Control-Allow-Credentials', 'true');
    response.headers.set('Vary', 'Origin');
  }
  response.headers.set('Access-Control-Allow-Methods', ALLOWED_METHODS);
  response.headers.set('Access-Control-Allow-Headers', allowedHeaders);
}

export const config = {
  matcher: ['/health', '/process-article', '/api/:path*'],
};
