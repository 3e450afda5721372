// src/swagger/swagger.service.ts
import { Logger } from '@nestjs/common';
import type { INestApplication } from '@nestjs/common/interfaces';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule } from '@nestjs/swagger';
import {
  createSwaggerConfig,
  SWAGGER_CONFIG,
  SWAGGER_PATH,
} from './swagger.config';

/** Mounts the OpenAPI docs; skipped in production. */
export class SwaggerService {
  private readonly logger = new Logger(SwaggerService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly app: INestApplication,
  ) {}

  setup(): void {
    if (this.configService.get<string>('environment') === 'production') {
      return;
    }

    const documentBuilder = createSwaggerConfig(
      this.configService.get<number>('port', 5555),
    );
    SWAGGER_CONFIG.tags.forEach((tag) => {
      documentBuilder.addTag(tag.name, tag.description);
    });

    const document = SwaggerModule.createDocument(
      this.app,
      documentBuilder.build(),
    );

    const tagOrder = SWAGGER_CONFIG.tags.map((tag) => tag.name);
    SwaggerModule.setup(SWAGGER_PATH, this.app, document, {
      swaggerOptions: {
        persistAuthorization: true,
        tagsSorter: (a: string, b: string) => {
          const indexA = tagOrder.indexOf(a);
          const indexB = tagOrder.indexOf(b);
          if (indexA === -1) return 1;
          if (indexB === -1) return -1;
          return indexA - indexB;
        },
        operationsSorter: 'alpha',
      },
    });

    this.logger.log(`Swagger documentation available at /${SWAGGER_PATH}`);
  }
}
