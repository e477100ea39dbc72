import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { configureApp, createCorsOriginCheck } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  const logger = app.get(Logger);

  app.useLogger(logger);

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"], // Swagger UI
          scriptSrc: ["'self'", "'unsafe-inline'"], // Swagger UI
          imgSrc: ["'self'", 'data:', 'https:'],
          objectSrc: ["'none'"],
        },
      },
      crossOriginEmbedderPolicy: false,
    }),
  );

  app.use(
    compression({
      level: 6,
      filter: (req, res) => {
        if (req.headers['x-no-compression']) {
          return false;
        }
        return compression.filter(req, res);
      },
    }),
  );

  const allowedOrigins = configService
    .get<string>('cors.origins', 'http://localhost:3000')
    .split(',')
    .map((origin) => origin.trim());

  app.enableCors({
    origin: createCorsOriginCheck(allowedOrigins),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Requested-With'],
    maxAge: 86400,
  });

  configureApp(app);

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Ledger API')
    .setDescription(
      'Records deposits and withdrawals against named accounts and exposes balances and transaction history.',
    )
    .setVersion('1.0.0')
    .addTag('Transactions', 'Record and list transactions')
    .addTag('Balance', 'Account balances')
    .addTag('Health', 'Service health checks')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document, {
    customSiteTitle: 'Ledger API Documentation',
  });

  const port = configService.get<number>('port', 3000);
  await app.listen(port);

  logger.log(`Ledger API is running on: http://localhost:${port}`);
  logger.log(`Swagger API docs available at: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start Ledger API', error);
  process.exit(1);
});
