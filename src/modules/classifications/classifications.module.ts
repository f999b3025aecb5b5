import { Module } from '@nestjs/common';
import { HttpModule, HttpService } from '@nestjs/axios';
import { ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { classifierConfig } from '../../configs/configuration';
import { RawEventEntity } from '../events/entities/raw-event.entity';
import { ClassificationsController } from './classifications.controller';
import { ClassificationsService } from './classifications.service';
import { COMMENT_CLASSIFIER, LlmCommentClassifier, NoopCommentClassifier } from './comment-classifier';
import { CommentClassificationEntity } from './entities/comment-classification.entity';

@Module({
  imports: [HttpModule, TypeOrmModule.forFeature([RawEventEntity, CommentClassificationEntity])],
  controllers: [ClassificationsController],
  providers: [
    ClassificationsService,
    {
      provide: COMMENT_CLASSIFIER,
      inject: [HttpService, classifierConfig.KEY],
      useFactory: (http: HttpService, config: ConfigType<typeof classifierConfig>) =>
        config.apiKey ? new LlmCommentClassifier(http, config) : new NoopCommentClassifier(),
    },
  ],
})
export class ClassificationsModule {}
