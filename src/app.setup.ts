import { INestApplication, ValidationPipe } from '@nestjs/common';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

/**
 * Request pipeline shared by the server and the integration tests:
 * consistent error responses and DTO validation
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      // values keep their JSON type: "7" or true is not an amount
      transform: true,
    }),
  );

  return app;
}

export type CorsOriginCallback = (error: Error | null, allow?: boolean) => void;

/**
 * Browser requests must come from an allowed origin.
 * Requests without an Origin header (curl, server-to-server) are not subject to CORS.
 */
export function createCorsOriginCheck(allowedOrigins: readonly string[]) {
  return (origin: string | undefined, callback: CorsOriginCallback): void => {
    if (!origin || allowedOrigins.includes(origin)) {
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  };
}
