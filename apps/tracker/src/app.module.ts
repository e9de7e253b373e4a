import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { databaseConfig, raceConfig, redisConfig, validate } from '@milemark/config';
import { Ping, RaceState } from '@milemark/entities';
import { mappingConfig } from '@milemark/mapping';
import { AppController } from './app.controller';
import { CourseModule } from './course/course.module';
import { PingsModule } from './pings/pings.module';
import { QueuesModule } from './queues/queues.module';
import { RaceModule } from './race/race.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, redisConfig, mappingConfig, raceConfig],
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get('database.host'),
        port: configService.get('database.port'),
        username: configService.get('database.username'),
        password: configService.get('database.password'),
        database: configService.get('database.database'),
        entities: [RaceState, Ping],
        autoLoadEntities: true,
        synchronize: process.env.NODE_ENV !== 'production',
      }),
    }),
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get('redis.host'),
          port: configService.get('redis.port'),
        },
      }),
    }),
    CourseModule,
    RaceModule,
    PingsModule,
    QueuesModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
