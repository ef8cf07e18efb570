// API Gateway response helpers

import { APIGatewayProxyResult } from 'aws-lambda';
import { ErrorResponse } from '../types/alarm';
import { ServiceError } from './errors';
import { Logger, describeError } from './logger';

export const ERROR_MESSAGE_500 = 'An internal server error has occurred: ';
export const ERROR_MESSAGE_400 = 'Your request is malformed or invalid: ';
export const ERROR_MESSAGE_404 = 'Route not found: ';

export function standardHeaders(): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  };
}

export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: standardHeaders(),
    body: JSON.stringify(body),
  };
}

export function errorResponse(statusCode: number, msg: string): APIGatewayProxyResult {
  const body: ErrorResponse = { msg };
  return jsonResponse(statusCode, body);
}

// CORS preflight: headers only
export function optionsResponse(): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: {
      ...standardHeaders(),
      'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
    },
    body: '',
  };
}

/**
 * Converts a thrown value into the `{ msg }` response of a synchronous route.
 * Service errors keep their status; anything else is a 500.
 */
export function toErrorResponse(error: unknown, logger: Logger): APIGatewayProxyResult {
  if (error instanceof ServiceError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request failed', { code: error.code, ...describeError(error) });

    const prefix = error.statusCode === 400 ? ERROR_MESSAGE_400 : error.statusCode >= 500 ? ERROR_MESSAGE_500 : '';
    return errorResponse(error.statusCode, prefix + error.message);
  }

  logger.error('Unexpected error handling request', describeError(error));
  return errorResponse(500, ERROR_MESSAGE_500 + (error instanceof Error ? error.message : String(error)));
}
