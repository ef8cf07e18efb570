import { captureLogger } from '../testing/fakes';
import { NotFoundError, StorageError, ValidationError } from './errors';
import { errorResponse, jsonResponse, toErrorResponse } from './http';

describe('HTTP helpers', () => {
  it('should serialize JSON bodies with CORS headers', () => {
    expect(jsonResponse(200, { ok: true })).toEqual({
      statusCode: 200,
      headers: { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' },
      body: '{"ok":true}',
    });
    expect(errorResponse(404, 'missing').body).toBe('{"msg":"missing"}');
  });

  describe('toErrorResponse', () => {
    it('should keep the status of service errors and prefix client and server errors', () => {
      const { logger } = captureLogger();

      expect(toErrorResponse(new ValidationError('MissingBody', 'no body'), logger)).toMatchObject({
        statusCode: 400,
        body: '{"msg":"Your request is malformed or invalid: no body"}',
      });
      expect(toErrorResponse(new NotFoundError('No video files found'), logger)).toMatchObject({
        statusCode: 404,
        body: '{"msg":"No video files found"}',
      });
      expect(toErrorResponse(new StorageError('Failed to list 2024-03-10/'), logger)).toMatchObject({
        statusCode: 500,
        body: '{"msg":"An internal server error has occurred: Failed to list 2024-03-10/"}',
      });
    });

    it('should turn unknown errors into a 500 and log them', () => {
      const { logger, lines } = captureLogger();

      expect(toErrorResponse(new TypeError('boom'), logger).statusCode).toBe(500);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: 'ERROR',
        message: 'Unexpected error handling request',
        data: { error: 'boom' },
      });
    });
  });
});
