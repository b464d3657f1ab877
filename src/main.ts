import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  // Validación global (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.enableCors({
    origin: '*',
    methods: 'GET,POST',
  });

  // Swagger
  const config = new DocumentBuilder()
    .setTitle('CNPJ Resolver API')
    .setDescription(
      'Microservicio de resolución de CNPJ de empresas brasileñas. Sin browser engines.\n\n' +
      '**Capas (en orden configurable):**\n' +
      '- `website`: web propia de la empresa (footer)\n' +
      '- `encyclopedia`: infobox de Wikipedia en portugués\n' +
      '- `search_engine`: Google vía SerpAPI (requiere SERPAPI_KEY)\n\n' +
      '**Filiales:** listado paginado de diretoriobrasil.net con rotación de proxies.\n\n' +
      '**Autenticación:** Header `x-api-key` requerido en todos los endpoints excepto `/cnpj/health`.',
    )
    .setVersion('1.0')
    .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'x-api-key')
    .addTag('CNPJ', 'Resolución, filiales y validación')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = app.get(ConfigService).getOrThrow<number>('scraper.port');
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 CNPJ Resolver API corriendo en http://localhost:${port}`);
  logger.log(`📚 Swagger docs en http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`❌ No se pudo iniciar: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
