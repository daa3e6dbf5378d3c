import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { Logger, LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { API_PREFIX, DEFAULT_HOST, DEFAULT_PORT } from './common/constants/constants';
import { isAllowedOrigin } from './common/utils/cors.util';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  Logger.setLevel(configService.getOrDefault('LOG_LEVEL', 'debug'));

  // Global pipes, filters, and interceptors
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.setGlobalPrefix(API_PREFIX);

  // CORS allow list via CORS_ORIGIN (comma-separated)
  const corsEnv = configService.getOrDefault('CORS_ORIGIN', '');
  const allowedOrigins = corsEnv ? corsEnv.split(',').map((s) => s.trim()) : ['http://localhost:8080'];

  app.enableCors({
    origin: (origin, callback) => {
      if (isAllowedOrigin(origin, allowedOrigins, configService.isProduction)) {
        return callback(null, true);
      }
      return callback(new Error('Not allowed by CORS'));
    },
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
    credentials: true,
  });

  const config = new DocumentBuilder()
    .setTitle('School Billing API')
    .setDescription('Invoices, payments and collection reports for schools')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = configService.getNumber('PORT', DEFAULT_PORT);
  const host = configService.getOrDefault('HOST', DEFAULT_HOST);
  await app.listen(port, host);

  Logger.log(`API listening on http://${host}:${port}/${API_PREFIX}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error('Failed to start the API', err instanceof Error ? err.stack || err.message : String(err), 'Bootstrap');
  process.exit(1);
});
