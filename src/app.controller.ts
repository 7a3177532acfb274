import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags } from '@nestjs/swagger';

export const APP_NAME = 'Weather Travel API';
export const APP_VERSION = '1.0.0';

// Provider name → env keys that must all be set for it to be used
const PROVIDER_KEYS: Readonly<Record<string, readonly string[]>> = {
  weather: ['WEATHER_API_KEY'],
  kma: ['KMA_API_KEY'],
  air_quality: ['PUBLIC_DATA_API_KEY'],
  naver: ['NAVER_CLIENT_ID', 'NAVER_CLIENT_SECRET'],
  google: ['GOOGLE_API_KEY'],
  tourism: ['KOREA_TOURISM_API_KEY'],
  openai: ['OPENAI_API_KEY'],
};

@ApiTags('health')
@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  root() {
    return { name: APP_NAME, version: APP_VERSION, docs: '/docs' };
  }

  @Get('health')
  health() {
    const providers: Record<string, boolean> = {};
    for (const [provider, keys] of Object.entries(PROVIDER_KEYS)) {
      providers[provider] = keys.every((key) => Boolean(this.configService.get<string>(key)));
    }
    return { status: 'ok', timestamp: new Date().toISOString(), providers };
  }
}
