/**
 * Verification Client
 *
 * Fetches security-grade reports and account details from the CheckFix API.
 * Each call is bounded by a timeout; failures are never retried here.
 *
 * @tested tests/integration/verification-client.integration.test.ts
 * @edgecase 404 on a report is NotFound; any other non-2xx is an ExternalServiceError
 * @edgecase network failures while validating account access mean "not valid"
 */

import { z } from 'zod';
import {
  ErrorCode,
  ExternalServiceError,
  getLogger,
  NotFoundError,
  VerificationReportSchema,
  type Logger,
  type VerificationReport,
} from '@supplier-compliance/shared';

const SERVICE_NAME = 'CheckFix';

/**
 * Client contract consumed by the engine
 */
export interface VerificationClient {
  verifyReport(reportHash: string, signal?: AbortSignal): Promise<VerificationReport>;
  getAccountDomain(accountId: string, signal?: AbortSignal): Promise<string>;
  validateAccountAccess(accountId: string, signal?: AbortSignal): Promise<boolean>;
}

export interface HttpVerificationClientConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export const DEFAULT_VERIFICATION_CLIENT_CONFIG: HttpVerificationClientConfig = {
  baseUrl: 'https://api.checkfix.io',
  apiKey: '',
  timeoutMs: 10000,
};

const AccountSchema = z.object({
  domain: z.string().min(1),
});

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * HTTP implementation backed by global fetch
 */
export class HttpVerificationClient implements VerificationClient {
  private readonly config: HttpVerificationClientConfig;
  private readonly logger: Logger;

  constructor(config: Partial<HttpVerificationClientConfig> = {}, logger: Logger = getLogger()) {
    const merged = { ...DEFAULT_VERIFICATION_CLIENT_CONFIG, ...config };
    this.config = { ...merged, baseUrl: merged.baseUrl.replace(/\/+$/, '') };
    this.logger = logger;
  }

  async verifyReport(reportHash: string, signal?: AbortSignal): Promise<VerificationReport> {
    const path = `/api/v1/reports/${encodeURIComponent(reportHash)}/verify`;
    const response = await this.get(path, 'verifyReport', signal);

    if (response.status === 404) {
      throw new NotFoundError(ErrorCode.REPORT_NOT_FOUND, 'Report', reportHash);
    }
    if (!response.ok) {
      throw await this.statusError(response, 'verifyReport');
    }

    const parsed = VerificationReportSchema.safeParse(await this.readJson(response, 'verifyReport'));
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE_NAME, 'CheckFix returned an invalid report payload', {
        statusCode: response.status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async getAccountDomain(accountId: string, signal?: AbortSignal): Promise<string> {
    const path = `/api/v1/accounts/${encodeURIComponent(accountId)}`;
    const response = await this.get(path, 'getAccountDomain', signal);

    if (!response.ok) {
      throw await this.statusError(response, 'getAccountDomain');
    }

    const parsed = AccountSchema.safeParse(await this.readJson(response, 'getAccountDomain'));
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE_NAME, 'CheckFix returned an invalid account payload', {
        statusCode: response.status,
        cause: parsed.error,
      });
    }
    return parsed.data.domain;
  }

  async validateAccountAccess(accountId: string, signal?: AbortSignal): Promise<boolean> {
    const path = `/api/v1/accounts/${encodeURIComponent(accountId)}/validate`;
    try {
      const response = await this.get(path, 'validateAccountAccess', signal);
      return response.status === 200;
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        this.logger.warn('Treating unreachable CheckFix account validation as invalid', {
          accountId,
          reason: error.message,
        });
        return false;
      }
      throw error;
    }
  }

  /**
   * Issues a GET with timeout handling. Only transport failures throw here;
   * HTTP status handling is left to the caller.
   */
  private async get(path: string, operation: string, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const startTime = Date.now();

    try {
      const response = await fetch(`${this.config.baseUrl}${path}`, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        signal: controller.signal,
      });

      this.logger.logDependency(SERVICE_NAME, operation, Date.now() - startTime, response.ok, 'HTTP');
      return response;
    } catch (error) {
      this.logger.logDependency(SERVICE_NAME, operation, Date.now() - startTime, false, 'HTTP');
      if (isAbortError(error)) {
        throw new ExternalServiceError(SERVICE_NAME, 'CheckFix request timed out', {
          code: ErrorCode.CHECKFIX_TIMEOUT,
          cause: error,
        });
      }
      throw new ExternalServiceError(SERVICE_NAME, 'CheckFix request failed', { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async readJson(response: Response, operation: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new ExternalServiceError(SERVICE_NAME, `CheckFix ${operation} returned malformed JSON`, {
        statusCode: response.status,
        cause: error,
      });
    }
  }

  private async statusError(response: Response, operation: string): Promise<ExternalServiceError> {
    const body = await response.text().catch((error: unknown) => {
      this.logger.warn('Could not read CheckFix error body', {
        operation,
        reason: error instanceof Error ? error.message : String(error),
      });
      return '';
    });
    return new ExternalServiceError(
      SERVICE_NAME,
      `CheckFix ${operation} returned ${response.status}${body ? `: ${body}` : ''}`,
      { statusCode: response.status }
    );
  }
}
