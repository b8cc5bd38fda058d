/**
 * Authenticator
 *
 * One credential exchange per run. Failures here are never retried: bad
 * credentials or an unreachable host will not fix themselves between attempts.
 *
 * @module authenticator
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { config } from '../config/env';
import { AppError, ErrorCode, HttpError, errorMessage } from '../utils/errors';
import { HttpClient } from './http-client';

export interface Credentials {
  /** API root, e.g. `https://acme.example.com/api/v6` */
  apiUrl: string;
  username: string;
  password: string;
}

const loginResponseSchema = z.object({
  result: z.union([
    z.object({ accessToken: z.string().min(1) }).passthrough(),
    // older API versions answer with the bare token
    z.string().min(1)
  ])
});

export async function authenticate(
  credentials: Credentials,
  httpClient: HttpClient = new HttpClient(config.http.authTimeoutMs)
): Promise<string> {
  const loginUrl = `${credentials.apiUrl}/login.json`;
  logger.info('Authenticating', { url: loginUrl, username: credentials.username });

  let body: string;
  try {
    const response = await httpClient.post(loginUrl, {
      username: credentials.username,
      password: credentials.password,
      only_token: 1
    });
    body = response.body;
  } catch (error) {
    throw toAuthenticationError(error, credentials.apiUrl);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new AppError(
      ErrorCode.AUTHENTICATION_ERROR,
      `Failed to parse authentication response: ${errorMessage(error)}`
    );
  }

  const result = loginResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new AppError(
      ErrorCode.AUTHENTICATION_ERROR,
      `Invalid token in authentication response. Response: ${body.slice(0, 200)}`
    );
  }

  logger.info('Authenticated');

  const token = result.data.result;
  return typeof token === 'string' ? token : token.accessToken;
}

function toAuthenticationError(error: unknown, apiUrl: string): AppError {
  if (error instanceof HttpError) {
    return new AppError(
      ErrorCode.AUTHENTICATION_ERROR,
      `Invalid response from API. Status code: ${error.status}. Response: ${error.body.slice(0, 200)}`,
      { status: error.status }
    );
  }

  if (error instanceof AppError && error.code === ErrorCode.TIMEOUT) {
    return new AppError(
      ErrorCode.AUTHENTICATION_ERROR,
      `Connection timeout when connecting to ${apiUrl}`
    );
  }

  return new AppError(
    ErrorCode.AUTHENTICATION_ERROR,
    `Server not responding. Failed to connect to ${apiUrl}: ${errorMessage(error)}`
  );
}
