import type { Express } from 'express';

export interface HealthResponse {
  status: 'healthy';
  version: string;
}

export function registerHealthRoute(app: Express, version: string): void {
  app.get('/health', (_req, res) => {
    const body: HealthResponse = { status: 'healthy', version };
    res.set('Cache-Control', 'no-store');
    res.status(200).json(body);
  });
}
