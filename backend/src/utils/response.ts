import type { APIGatewayProxyResult } from 'aws-lambda';
import type { ApiError, ApiResponse } from '@formveil/shared';

function corsHeaders() {
  return {
    'Access-Control-Allow-Origin': process.env.FRONTEND_ORIGIN ?? '*',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  };
}

export function success<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  const body: ApiResponse<T> = { success: true, data };
  return {
    statusCode,
    headers: corsHeaders(),
    body: JSON.stringify(body),
  };
}

export function error(message: string, statusCode = 400, details?: string[]): APIGatewayProxyResult {
  const body: ApiError = { error: message, statusCode };
  if (details) body.details = details;
  return {
    statusCode,
    headers: corsHeaders(),
    body: JSON.stringify(body),
  };
}
