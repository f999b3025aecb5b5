import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigType } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { classifierConfig } from '../../configs/configuration';
import { CommentQuality, parseCommentQuality } from '../scoring/comment-quality';

export const COMMENT_CLASSIFIER = Symbol('COMMENT_CLASSIFIER');

export interface ClassifiableComment {
  commentId: string;
  body: string;
  path: string | null;
}

/** Rates one review comment; `null` means no usable rating. */
export interface CommentClassifier {
  readonly enabled: boolean;
  classify(comment: ClassifiableComment): Promise<CommentQuality | null>;
}

export class NoopCommentClassifier implements CommentClassifier {
  readonly enabled = false;

  async classify(): Promise<CommentQuality | null> {
    return null;
  }
}

const SYSTEM_PROMPT = [
  'You rate code review comments.',
  'Reply with a JSON object {"category": string, "quality_score": integer}.',
  'category is one of: cosmetic, logic, structural, nit, question.',
  'quality_score is 1 (noise) to 10 (catches a real defect or design flaw).',
].join(' ');

interface ChatCompletionResponse {
  choices?: { message?: { content?: string | null } }[];
}

/** OpenAI-compatible chat completion in JSON mode. */
export class LlmCommentClassifier implements CommentClassifier {
  readonly enabled = true;
  private readonly logger = new Logger(LlmCommentClassifier.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly config: ConfigType<typeof classifierConfig>,
  ) {}

  async classify(comment: ClassifiableComment): Promise<CommentQuality | null> {
    const { data } = await firstValueFrom(
      this.httpService.post<ChatCompletionResponse>(
        this.config.apiUrl,
        {
          model: this.config.model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: JSON.stringify({ file: comment.path, comment: comment.body }) },
          ],
        },
        {
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            'Content-Type': 'application/json',
          },
        },
      ),
    );

    const content = data.choices?.[0]?.message?.content;
    const quality = content ? parseClassifierReply(content) : null;
    if (!quality) this.logger.warn(`Unusable classification for comment ${comment.commentId}`);
    return quality;
  }
}

export function parseClassifierReply(content: string): CommentQuality | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const category = 'category' in parsed ? parsed.category : undefined;
  const score =
    'quality_score' in parsed
      ? parsed.quality_score
      : 'qualityScore' in parsed
        ? parsed.qualityScore
        : undefined;
  return parseCommentQuality(category, score);
}
