import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory, Reflector } from '@nestjs/core';
import { AppModule } from './app.module';
import { configSwagger } from './configs/api-docs.config';
import { SyncErrorFilter } from './filters/sync-error.filter';
import { ResponseInterceptor } from './interceptors/response.interceptor';

async function bootstrap() {
  const logger = new Logger(bootstrap.name);
  const app = await NestFactory.create(AppModule);
  const reflector = app.get(Reflector);

  app.useGlobalInterceptors(new ResponseInterceptor(reflector));
  app.useGlobalFilters(new SyncErrorFilter());
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: '*',
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    allowedHeaders: '*',
  });

  configSwagger(app);

  const port = process.env.PORT || 4000;
  await app.listen(port);
  logger.log(`Server running on: http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('bootstrap').error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
