import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { API_PREFIX } from './common/routing/routes';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  // Security: Apply Helmet for HTTP security headers
  app.use(helmet());

  // Enable graceful shutdown hooks (SIGTERM, SIGINT)
  app.enableShutdownHooks();

  configureApp(app);

  const config = new DocumentBuilder()
    .setTitle(process.env.APP_NAME || 'IT Asset Registry API')
    .setDescription('Companies, employees, assets, components, procurement and the activity log')
    .setVersion('1.0')
    .addTag('Assets', 'Asset records, assignment and transfer')
    .addTag('Components', 'Components and their parent assets')
    .addTag('Spare Parts', 'Spare component stock per type')
    .addTag('Activity', 'Activity log')
    .addTag('Dashboard', 'Registry overview')
    .build();

  if (process.env.NODE_ENV !== 'production' || process.env.ENABLE_SWAGGER === 'true') {
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api/docs', app, document);
  }

  const port = process.env.PORT || 3000;
  await app.listen(port);

  Logger.log(`Listening on http://localhost:${port}/${API_PREFIX}`, 'Bootstrap');
}
void bootstrap();
