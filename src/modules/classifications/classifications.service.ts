import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { In, MoreThan, Repository } from 'typeorm';
import { classifierConfig } from '../../configs/configuration';
import { RawEventEntity } from '../events/entities/raw-event.entity';
import { CommentQuality } from '../scoring/comment-quality';
import { isBot, isSubstantive } from '../sessions/session.segmenter';
import { COMMENT_CLASSIFIER, CommentClassifier } from './comment-classifier';
import { ClassificationStatus, CommentClassificationEntity } from './entities/comment-classification.entity';

const SCAN_PAGE = 200;

export interface ClassificationBatchReport {
  enabled: boolean;
  considered: number;
  classified: number;
  unusable: number;
  failed: number;
}

interface PendingComment {
  row: RawEventEntity;
  commentId: string;
  attempts: number;
}

@Injectable()
export class ClassificationsService {
  private readonly logger = new Logger(ClassificationsService.name);

  constructor(
    @InjectRepository(RawEventEntity)
    private readonly eventRepository: Repository<RawEventEntity>,
    @InjectRepository(CommentClassificationEntity)
    private readonly classificationRepository: Repository<CommentClassificationEntity>,
    @Inject(COMMENT_CLASSIFIER)
    private readonly classifier: CommentClassifier,
    @Inject(classifierConfig.KEY)
    private readonly config: ConfigType<typeof classifierConfig>,
  ) {}

  /**
   * Classifies up to one batch of stored, substantive inline comments that
   * have no rating yet, plus failed ones with attempts left. Every outcome is
   * recorded so later batches move past it. Ratings are picked up by the next
   * rebuild.
   */
  async runBatch(): Promise<ClassificationBatchReport> {
    const report: ClassificationBatchReport = {
      enabled: this.classifier.enabled,
      considered: 0,
      classified: 0,
      unusable: 0,
      failed: 0,
    };
    if (!this.classifier.enabled) return report;

    const batch = await this.pendingComments(this.config.batchSize);
    report.considered = batch.length;

    for (const { row, commentId, attempts } of batch) {
      const attempt = attempts + 1;
      try {
        const quality = await this.classifier.classify({
          commentId,
          body: row.body ?? '',
          path: row.path,
        });
        if (!quality) {
          report.unusable += 1;
          await this.record(commentId, attempt, 'unusable', null, 'no usable rating');
          continue;
        }
        await this.record(commentId, attempt, 'classified', quality, null);
        report.classified += 1;
      } catch (err) {
        report.failed += 1;
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(
          `Classifying comment ${commentId} failed (attempt ${attempt}/${this.config.maxAttempts}): ${message}`,
        );
        await this.record(commentId, attempt, 'failed', null, message);
      }
    }

    this.logger.log(
      `Classification batch: ${report.classified}/${report.considered} classified, ${report.failed} failed`,
    );
    return report;
  }

  private async record(
    commentId: string,
    attempts: number,
    status: ClassificationStatus,
    quality: CommentQuality | null,
    lastError: string | null,
  ): Promise<void> {
    await this.classificationRepository.save({
      commentId,
      status,
      attempts,
      category: quality?.category ?? null,
      qualityScore: quality?.qualityScore ?? null,
      lastError,
    });
  }

  /** Walks comments in id order, one page at a time, until the batch is full. */
  private async pendingComments(limit: number): Promise<PendingComment[]> {
    const pending: PendingComment[] = [];
    let afterId = 0;

    while (pending.length < limit) {
      const page = await this.eventRepository.find({
        where: { type: 'comment_posted', id: MoreThan(afterId) },
        order: { id: 'ASC' },
        take: SCAN_PAGE,
      });
      if (page.length === 0) break;
      afterId = page[page.length - 1].id;

      const candidates = page.flatMap((c) =>
        c.sourceId !== null && c.actor !== null && !isBot(c.actor) && isSubstantive(c.body ?? '')
          ? [{ row: c, commentId: c.sourceId }]
          : [],
      );
      if (candidates.length === 0) continue;

      const seen = await this.classificationRepository.find({
        where: { commentId: In(candidates.map((c) => c.commentId)) },
      });
      const previous = new Map(seen.map((s) => [s.commentId, s] as const));

      for (const candidate of candidates) {
        if (pending.length >= limit) break;
        const earlier = previous.get(candidate.commentId);
        if (!earlier) {
          pending.push({ ...candidate, attempts: 0 });
        } else if (earlier.status === 'failed' && earlier.attempts < this.config.maxAttempts) {
          pending.push({ ...candidate, attempts: earlier.attempts });
        }
      }
    }
    return pending;
  }
}
