// Application root: configuration, cache store and the quote domain.
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { redisStore } from 'cache-manager-redis-yet';
import quotesConfig from './config/quotes.config';
import { validate } from './config/env-validation';
import { CurrenciesModule } from './currencies/currencies.module';
import { QuotesModule } from './quotes/quotes.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    // .env + process env, validated once (global)
    ConfigModule.forRoot({ isGlobal: true, load: [quotesConfig], validate }),
    // Redis when configured, in-memory otherwise (global)
    CacheModule.registerAsync({
      isGlobal: true,
      inject: [quotesConfig.KEY],
      useFactory: async (cfg: ConfigType<typeof quotesConfig>) => {
        const { redis, ttlMs } = cfg.cache;
        if (redis) {
          return {
            ttl: ttlMs,
            store: await redisStore({ socket: { host: redis.host, port: redis.port }, ttl: ttlMs }),
          };
        }
        return { ttl: ttlMs };
      },
    }),
    CurrenciesModule,
    QuotesModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
