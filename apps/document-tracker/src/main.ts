import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app/app.module';

async function bootstrap() {
    const app = await NestFactory.create(AppModule);
    app.enableShutdownHooks();
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

    const port = Number(process.env.PORT) || 3000;
    await app.listen(port);
    Logger.log(`Document tracker listening on port ${port}`, 'Bootstrap');
}
void bootstrap();
