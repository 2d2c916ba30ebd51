import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  async rewrites() {
    return [
      { source: '/health', destination: '/api/health' },
      { source: '/process-article', destination: '/api/process-article' },
    ];
  },
  // pdfkit lee sus fuentes AFM desde disco, no debe pasar por el bundler
  serverExternalPackages: ['pdfkit'],
  typescript: {
    ignoreBuildErrors: false,
  },
};

export default nextConfig;
