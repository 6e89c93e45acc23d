import { INestApplication } from '@nestjs/common';
import { createValidationPipe } from '../shared/validation/validation-pipe';
import { HttpConfig, httpConfig } from './config/configuration';

/**
 * Application-wide wiring that lives outside AppModule: CORS and the global validation pipe.
 */
export function configureApp(app: INestApplication): void {
  const http = app.get<HttpConfig>(httpConfig.KEY);

  app.enableCors({
    origin: http.corsOrigin,
    credentials: true,
  });

  app.useGlobalPipes(createValidationPipe());
}
