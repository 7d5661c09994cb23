import { INestApplication, RequestMethod } from '@nestjs/common';

export const API_PREFIX = 'api';

/** Shared by main.ts and the e2e specs so both serve the same routes. */
export function setupApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix(API_PREFIX, {
    exclude: [{ path: 'test-cors', method: RequestMethod.GET }],
  });
  return app;
}
