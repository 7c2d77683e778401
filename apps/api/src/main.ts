import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';
import { ensureBootstrapEnv } from './bootstrap-env';
import { BufferedLogger } from './logs/buffered-logger';
import { readAppMeta } from './app.meta';
import {
  API_DEFAULT_HOST,
  API_DEFAULT_PORT,
  API_DEV_PORT_EXAMPLE,
  API_DOCS_PATH,
  API_GLOBAL_PREFIX,
  API_PREFIX_PATH,
  HTTP_SLOW_REQUEST_THRESHOLD_MS,
} from './app.constants';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

async function bootstrap() {
  const env = await ensureBootstrapEnv();
  const bootstrapLogger = new Logger('Bootstrap');

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error(`Unhandled rejection: ${String(reason)}`);
  });
  process.on('uncaughtException', (err) => {
    bootstrapLogger.error(`Uncaught exception: ${err.stack ?? String(err)}`);
    process.exit(1);
  });

  const app = await NestFactory.create(AppModule, {
    logger: new BufferedLogger(),
  });
  // SIGTERM/SIGINT run onApplicationShutdown, which stops the scheduler loop.
  app.enableShutdownHooks();

  app.setGlobalPrefix(API_GLOBAL_PREFIX);

  if (process.env.NODE_ENV !== 'production') {
    app.enableCors({ origin: true });
  }

  // Lightweight request logging (only warnings/errors/slow requests)
  const httpLoggingEnabled =
    process.env.HTTP_LOGGING === 'true' ||
    (process.env.HTTP_LOGGING !== 'false' &&
      process.env.NODE_ENV !== 'production');
  if (httpLoggingEnabled) {
    const httpLogger = new Logger('HTTP');
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();
      res.on('finish', () => {
        const ms = Number(process.hrtime.bigint() - start) / 1e6;
        const status = res.statusCode;
        const path = req.originalUrl || req.url;
        const msg = `${req.method} ${path} -> ${status} ${ms.toFixed(0)}ms`;

        if (status >= 500) httpLogger.error(msg);
        else if (status >= 400) httpLogger.warn(msg);
        else if (ms >= HTTP_SLOW_REQUEST_THRESHOLD_MS)
          httpLogger.warn(`SLOW ${msg}`);
      });
      next();
    });
  }

  const swaggerEnabled =
    process.env.SWAGGER_ENABLED === 'true' ||
    (process.env.SWAGGER_ENABLED !== 'false' &&
      process.env.NODE_ENV !== 'production');
  if (swaggerEnabled) {
    const meta = readAppMeta();
    const config = new DocumentBuilder()
      .setTitle('Unmonitorr API')
      .setDescription(
        'Unmonitors Radarr movies and Sonarr episodes once their file reaches the target quality.',
      )
      .setVersion(meta.version)
      .build();

    const document = SwaggerModule.createDocument(app, config);
    // Swagger routes ignore the global prefix; it is part of API_DOCS_PATH.
    SwaggerModule.setup(API_DOCS_PATH, app, document);
  }

  const port = Number.parseInt(process.env.PORT ?? `${API_DEFAULT_PORT}`, 10);
  const host = process.env.HOST ?? API_DEFAULT_HOST;
  try {
    await app.listen(port, host);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EADDRINUSE') {
      bootstrapLogger.error(
        `Port ${port} is already in use. Stop the other process or set PORT to a free port.`,
      );
      bootstrapLogger.error(`Example: PORT=${API_DEV_PORT_EXAMPLE} npm start`);
      process.exit(1);
    }
    throw err;
  }

  const url = await app.getUrl().catch(() => `http://${host}:${port}`);
  bootstrapLogger.log(
    `API listening: ${url}${API_PREFIX_PATH} (dataDir=${env.dataDir})`,
  );
}
void bootstrap().catch((err) => {
  const logger = new Logger('Bootstrap');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
