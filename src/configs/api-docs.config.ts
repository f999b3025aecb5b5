import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

export function configSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle('Review Quest')
    .setDescription('Review sessions, XP, levels and achievements derived from pull request activity')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);
}
