import { describe, it, expect, vi } from 'vitest';
import { SearchError } from '../errors';
import { EventLogger } from '../observability';
import type { GroundedContentGenerator } from './geminiClient';
import { parseGroundedResponse, queryWithGrounding } from './searchService';

function fakeClient(result: unknown) {
  return { generateGrounded: vi.fn().mockResolvedValue(result) };
}

const groundedResponse = {
  candidates: [
    {
      content: { parts: [{ text: 'Spain won Euro 2024.' }, { text: ' The final was in Berlin.' }] },
      groundingMetadata: {
        webSearchQueries: ['euro 2024 winner'],
        groundingChunks: [
          { web: { uri: 'https://example.com/a', title: 'Example A' } },
          { web: { title: 'No uri here' } },
          { web: { uri: 'https://example.com/c' } }
        ],
        groundingSupports: [
          { segment: { endIndex: 20, text: 'Spain won Euro 2024.' }, groundingChunkIndices: [0] },
          { groundingChunkIndices: [1] },
          {
            segment: { startIndex: 21, endIndex: 45, text: 'The final was in Berlin.' },
            groundingChunkIndices: [2, 1]
          }
        ]
      }
    }
  ]
};

describe('parseGroundedResponse', () => {
  it('собирает текст из всех text parts первого кандидата', () => {
    const response = parseGroundedResponse(groundedResponse);
    expect(response.responseText).toBe('Spain won Euro 2024. The final was in Berlin.');
  });

  it('нумерует citations по позиции chunk, сохраняя пропуски', () => {
    const response = parseGroundedResponse(groundedResponse);
    expect(response.citations).toEqual([
      { index: 1, uri: 'https://example.com/a', title: 'Example A' },
      { index: 3, uri: 'https://example.com/c', title: '' }
    ]);
  });

  it('index - 1 всегда равен позиции исходного chunk', () => {
    const chunks = [
      { web: { uri: 'https://one' } },
      {},
      { uri: 'https://three', title: 'Flat' },
      { web: {} },
      'not a chunk',
      { web: { uri: 'https://six' } }
    ];
    const response = parseGroundedResponse({ candidates: [{ groundingMetadata: { groundingChunks: chunks } }] });

    expect(response.citations.map(c => c.index)).toEqual([1, 3, 6]);
    for (const citation of response.citations) {
      const chunk = chunks[citation.index - 1];
      expect(JSON.stringify(chunk)).toContain(citation.uri);
    }
  });

  it('читает uri и title из плоского chunk', () => {
    const response = parseGroundedResponse({
      candidates: [{ groundingMetadata: { groundingChunks: [{ uri: 'https://flat', title: 'Flat source' }] } }]
    });
    expect(response.citations).toEqual([{ index: 1, uri: 'https://flat', title: 'Flat source' }]);
  });

  it('отбрасывает supports без segment и подставляет значения по умолчанию', () => {
    const response = parseGroundedResponse(groundedResponse);
    expect(response.groundingSegments).toEqual([
      { startIndex: 0, endIndex: 20, text: 'Spain won Euro 2024.', chunkIndices: [0] },
      { startIndex: 21, endIndex: 45, text: 'The final was in Berlin.', chunkIndices: [2, 1] }
    ]);
    expect(response.webSearchQueries).toEqual(['euro 2024 winner']);
  });

  it('оставляет queries и segments отсутствующими, если они пусты', () => {
    const response = parseGroundedResponse({
      candidates: [
        {
          content: { parts: [{ text: 'Answer' }] },
          groundingMetadata: { webSearchQueries: [], groundingSupports: [{ groundingChunkIndices: [0] }] }
        }
      ]
    });
    expect(response).toEqual({ responseText: 'Answer', citations: [] });
    expect('groundingSegments' in response).toBe(false);
    expect('webSearchQueries' in response).toBe(false);
  });

  it('возвращает пустой ответ без кандидатов', () => {
    expect(parseGroundedResponse({})).toEqual({ responseText: '', citations: [] });
    expect(parseGroundedResponse({ candidates: [] })).toEqual({ responseText: '', citations: [] });
    expect(parseGroundedResponse({ candidates: [{ content: {} }] })).toEqual({ responseText: '', citations: [] });
  });

  it('игнорирует поля неверного типа', () => {
    const response = parseGroundedResponse({
      candidates: [
        {
          content: { parts: [{ text: 42 }, { text: 'ok' }, { functionCall: { name: 'x' } }] },
          groundingMetadata: { groundingChunks: 'broken', webSearchQueries: [1, 2] }
        }
      ]
    });
    expect(response).toEqual({ responseText: 'ok', citations: [] });
  });

  it('отбрасывает только неверные элементы groundingChunkIndices', () => {
    const response = parseGroundedResponse({
      candidates: [
        {
          content: { parts: [{ text: 'Hello' }] },
          groundingMetadata: {
            groundingSupports: [{ segment: { endIndex: 5, text: 'Hello' }, groundingChunkIndices: [2, 'x', 1.5, null, 0] }]
          }
        }
      ]
    });
    expect(response.groundingSegments).toEqual([{ startIndex: 0, endIndex: 5, text: 'Hello', chunkIndices: [2, 0] }]);
  });

  it('бросает SearchError, если ответ не объект', () => {
    expect(() => parseGroundedResponse(null)).toThrow(SearchError);
    expect(() => parseGroundedResponse('text')).toThrow(/^Malformed response: /);
  });
});

describe('queryWithGrounding', () => {
  it('запрашивает модель по умолчанию', async () => {
    const client = fakeClient(groundedResponse);
    await queryWithGrounding(client, 'Who won euro 2024?');
    expect(client.generateGrounded).toHaveBeenCalledWith('Who won euro 2024?', 'gemini-2.5-flash');
  });

  it('передаёт выбранную модель', async () => {
    const client = fakeClient(groundedResponse);
    const response = await queryWithGrounding(client, 'prompt', { model: 'gemini-2.5-pro' });
    expect(client.generateGrounded).toHaveBeenCalledWith('prompt', 'gemini-2.5-pro');
    expect(response.citations).toHaveLength(2);
  });

  it('оборачивает ошибку клиента в SearchError с исходным сообщением', async () => {
    const original = new Error('quota exceeded');
    const client: GroundedContentGenerator = { generateGrounded: vi.fn().mockRejectedValue(original) };

    const promise = queryWithGrounding(client, 'prompt');
    await expect(promise).rejects.toBeInstanceOf(SearchError);
    await expect(promise).rejects.toMatchObject({ message: 'Query failed: quota exceeded', cause: original });
  });

  it('оборачивает некорректный ответ в SearchError', async () => {
    await expect(queryWithGrounding(fakeClient(undefined), 'prompt')).rejects.toThrow(
      /^Query failed: Malformed response: /
    );
  });

  it('логирует сырой ответ на уровне trace', async () => {
    const logger = new EventLogger({ logLevel: 'trace', consoleLogging: false });
    await queryWithGrounding(fakeClient(groundedResponse), 'prompt', { logger });

    expect(logger.getEventsByType('api_call')).toHaveLength(1);
    expect(logger.getEventsByType('raw_response')[0]?.data).toEqual({ response: groundedResponse });
    expect(logger.getEventsByType('api_response')[0]?.data).toEqual({
      responseLength: 45,
      citations: 2,
      segments: 2
    });
  });
});
