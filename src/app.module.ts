import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { RedisModule } from './redis/redis.module';
import { RabbitMQModule } from './rabbitmq/rabbitmq.module';
import { CommonModule } from './common/common.module';
import { AuditModule } from './audit/audit.module';
import { NotificationModule } from './notification/notification.module';
import { MembershipModule } from './membership/membership.module';
import { MatchModule } from './match/match.module';
import { PredictionModule } from './prediction/prediction.module';
import { LeaderboardModule } from './leaderboard/leaderboard.module';
import { ResultModule } from './result/result.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ScheduleModule.forRoot(),
    PrometheusModule.register({
      path: '/metrics',
      defaultMetrics: {
        enabled: true,
      },
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.database'),
        entities: [__dirname + '/**/*.entity{.ts,.js}'],
        synchronize: false, // Schema is managed by migrations
        logging: configService.get<string>('nodeEnv') === 'development',
        extra: {
          max: configService.get<number>('database.poolSize'),
          connectionTimeoutMillis: configService.get<number>('database.connectionTimeoutMillis'),
        },
      }),
      inject: [ConfigService],
    }),
    RedisModule,
    RabbitMQModule,
    CommonModule,
    AuditModule,
    NotificationModule,
    MembershipModule,
    MatchModule,
    PredictionModule,
    LeaderboardModule,
    ResultModule,
  ],
})
export class AppModule {}
