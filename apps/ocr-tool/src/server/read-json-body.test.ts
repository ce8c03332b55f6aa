import { Readable } from 'node:stream';
import { describe, expect, test } from 'vitest';

import { RequestBodyError, readJsonBody } from './read-json-body';

describe('readJsonBody', () => {
  test('joins chunks and parses them', async () => {
    await expect(
      readJsonBody(Readable.from([Buffer.from('{"urls":'), '["a"]}'])),
    ).resolves.toEqual({ urls: ['a'] });
  });

  test('rejects an empty body', async () => {
    await expect(readJsonBody(Readable.from([' ']))).rejects.toMatchObject({
      statusCode: 400,
      code: 'INVALID_JSON',
      message: 'Request body is empty',
    });
  });

  test('rejects a body above the limit', async () => {
    const error = await readJsonBody(
      Readable.from([Buffer.from('{"a":"0123456789"}')]),
      8,
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RequestBodyError);
    expect(error).toMatchObject({
      statusCode: 413,
      code: 'PAYLOAD_TOO_LARGE',
      message: 'Request body exceeds 8 bytes',
    });
  });
});
