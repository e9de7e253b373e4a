import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Ping } from '@milemark/entities';
import { RaceModule } from '../race/race.module';
import { PingsController } from './pings.controller';
import { PingsService } from './pings.service';

@Module({
  imports: [TypeOrmModule.forFeature([Ping]), RaceModule],
  controllers: [PingsController],
  providers: [PingsService],
})
export class PingsModule {}
