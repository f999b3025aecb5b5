import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UsersModule } from '../users/users.module';
import { SeasonEntity } from './entities/season.entity';
import { SeasonsController } from './seasons.controller';
import { SeasonsCron } from './seasons.cron';
import { SeasonsService } from './seasons.service';

@Module({
  imports: [TypeOrmModule.forFeature([SeasonEntity]), UsersModule],
  controllers: [SeasonsController],
  providers: [SeasonsService, SeasonsCron],
})
export class SeasonsModule {}
