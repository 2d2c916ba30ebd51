/**
 * @jest-environment node
 */

import { GET } from '@/app/api/health/route';

describe('/api/health', () => {
  it('should report a healthy service', async () => {
    const response = await GET();

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ status: 'healthy' });
  });
});
