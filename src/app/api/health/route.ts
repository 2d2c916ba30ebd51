import { NextResponse } from 'next/server';

/**
 * Health check endpoint
 * GET /api/health (también /health)
 */
export async function GET() {
  return NextResponse.json({ status: 'healthy' });
}
