import { registerAs } from '@nestjs/config';
import { intFromEnv } from './env.util';

export default registerAs('tailoring', () => ({
  defaultMaxBullets: intFromEnv('TAILOR_DEFAULT_MAX_BULLETS', 15, 1),
  concurrency: intFromEnv('TAILOR_CONCURRENCY', 4, 1),
  defaultStyle: process.env.TAILOR_DEFAULT_STYLE || 'professional',
}));
