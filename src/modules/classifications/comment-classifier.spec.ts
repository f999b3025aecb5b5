import { HttpService } from '@nestjs/axios';
import { fakeAxios } from '../../../test/fake-axios';
import { LlmCommentClassifier, NoopCommentClassifier, parseClassifierReply } from './comment-classifier';

const config = {
  apiKey: 'test-secret',
  apiUrl: 'https://llm.invalid/v1/chat/completions',
  model: 'test-model',
  batchSize: 5,
  maxAttempts: 3,
};

const comment = { commentId: '77', body: 'This loop never terminates when the list is empty', path: 'src/a.ts' };

describe('parseClassifierReply', () => {
  it('accepts snake_case and camelCase scores', () => {
    expect(parseClassifierReply('{"category":"logic","quality_score":8}')).toEqual({
      category: 'logic',
      qualityScore: 8,
    });
    expect(parseClassifierReply('{"category":"nit","qualityScore":2}')).toEqual({
      category: 'nit',
      qualityScore: 2,
    });
  });

  it('rejects malformed replies', () => {
    expect(parseClassifierReply('not json')).toBeNull();
    expect(parseClassifierReply('[1,2]')).toBeNull();
    expect(parseClassifierReply('{"category":"style","quality_score":5}')).toBeNull();
    expect(parseClassifierReply('{"category":"logic","quality_score":0}')).toBeNull();
    expect(parseClassifierReply('{"category":"logic","quality_score":7.5}')).toBeNull();
  });
});

describe('LlmCommentClassifier', () => {
  it('posts the comment in JSON mode and parses the reply', async () => {
    const { client, requests } = fakeAxios(() => ({
      status: 200,
      data: { choices: [{ message: { content: '{"category":"logic","quality_score":9}' } }] },
    }));
    const classifier = new LlmCommentClassifier(new HttpService(client), config);

    await expect(classifier.classify(comment)).resolves.toEqual({ category: 'logic', qualityScore: 9 });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      method: 'POST',
      url: config.apiUrl,
      body: { model: 'test-model', temperature: 0, response_format: { type: 'json_object' } },
    });
  });

  it('returns null when the model reply is unusable', async () => {
    const { client } = fakeAxios(() => ({ status: 200, data: { choices: [] } }));
    const classifier = new LlmCommentClassifier(new HttpService(client), config);
    await expect(classifier.classify(comment)).resolves.toBeNull();
  });

  it('propagates transport failures to the caller', async () => {
    const { client } = fakeAxios(() => ({ status: 500 }));
    const classifier = new LlmCommentClassifier(new HttpService(client), config);
    await expect(classifier.classify(comment)).rejects.toThrow('Request failed with status code 500');
  });
});

describe('NoopCommentClassifier', () => {
  it('never rates anything', async () => {
    const classifier = new NoopCommentClassifier();
    expect(classifier.enabled).toBe(false);
    await expect(classifier.classify()).resolves.toBeNull();
  });
});
