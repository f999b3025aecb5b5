import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { classifierConfig, databaseConfig, githubConfig, syncConfig } from './configs/configuration';
import { validate } from './configs/env.validation';
import { AchievementsModule } from './modules/achievements/achievements.module';
import { ClassificationsModule } from './modules/classifications/classifications.module';
import { RecalculationModule } from './modules/recalculation/recalculation.module';
import { RepositoriesModule } from './modules/repositories/repositories.module';
import { SeasonsModule } from './modules/seasons/seasons.module';
import { SessionsModule } from './modules/sessions/sessions.module';
import { SyncModule } from './modules/sync/sync.module';
import { TeamsModule } from './modules/teams/teams.module';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
      load: [databaseConfig, githubConfig, syncConfig, classifierConfig],
    }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (db: ConfigType<typeof databaseConfig>) => ({
        type: 'postgres',
        host: db.host,
        port: db.port,
        username: db.username,
        password: db.password,
        database: db.database,
        ssl: db.ssl ? { rejectUnauthorized: false } : false,
        autoLoadEntities: true,
        synchronize: db.synchronize,
        migrationsRun: db.migrationsRun,
        logging: db.logging,
        extra: {
          max: db.poolMax,
        },
      }),
    }),
    RepositoriesModule,
    SyncModule,
    RecalculationModule,
    SessionsModule,
    UsersModule,
    AchievementsModule,
    ClassificationsModule,
    SeasonsModule,
    TeamsModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
