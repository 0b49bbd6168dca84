import { BadRequestException, INestApplication, ValidationPipe } from '@nestjs/common';

// Shared by the entry point and the end-to-end tests.
export function configureApp(app: INestApplication, prefix: string) {
  app.setGlobalPrefix(prefix, { exclude: ['/', 'health'] });
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      exceptionFactory: errors =>
        new BadRequestException({ error: errors.flatMap(e => Object.values(e.constraints ?? {})) }),
    }),
  );
  app.enableShutdownHooks();
  return app;
}
