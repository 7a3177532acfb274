import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import destinations from './recommendations/data/destinations.json';
import { CreateDestinationDto } from './recommendations/dto/destination.dto';
import { RecommendationsService } from './recommendations/recommendations.service';

async function bootstrap() {
  const logger = new Logger('Seeder');
  const app = await NestFactory.createApplicationContext(AppModule);
  const recommendationsService = app.get(RecommendationsService);
  const seeds: CreateDestinationDto[] = destinations;

  try {
    logger.log(`Seeding ${seeds.length} destinations`);
    let created = 0;
    let updated = 0;
    for (const seed of seeds) {
      const outcome = await recommendationsService.upsert(seed);
      if (outcome === 'created') {
        created++;
      } else {
        updated++;
      }
    }
    logger.log(`Done: ${created} created, ${updated} updated`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Seeder').error('Seeding failed', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
