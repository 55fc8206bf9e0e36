import { PIPELINE_ERROR_CODES, PipelineError, describeError, type PipelineErrorCode } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { AliveSsnsPayload } from '../query/alive-ssns.js';

export const DEFAULT_CHALLENGE_BASE_URL = 'https://hackattic.com';

const CHALLENGE_PATH = '/challenges/backup_restore';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ChallengeClientOptions {
  baseUrl?: string;
  /** Adds playground=1 to the solve call. */
  playground?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}

type ProblemResponse = {
  dump: string;
};

const isProblemResponse = (value: unknown): value is ProblemResponse =>
  typeof value === 'object'
  && value !== null
  && 'dump' in value
  && typeof value.dump === 'string';

export class ChallengeClient {
  private readonly baseUrl: string;
  private readonly playground: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: ChallengeClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_CHALLENGE_BASE_URL).replace(/\/+$/, '');
    this.playground = options.playground ?? true;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  problemUrl(accessToken: string): string {
    const params = new URLSearchParams({ access_token: accessToken });
    return `${this.baseUrl}${CHALLENGE_PATH}/problem?${params.toString()}`;
  }

  solveUrl(accessToken: string): string {
    const params = new URLSearchParams({ access_token: accessToken });
    if (this.playground) {
      params.set('playground', '1');
    }
    return `${this.baseUrl}${CHALLENGE_PATH}/solve?${params.toString()}`;
  }

  /**
   * Downloads the encoded dump for this token.
   * @returns The base64 payload exactly as served
   */
  async fetchDump(accessToken: string): Promise<string> {
    const url = this.problemUrl(accessToken);
    this.logger.info(`Getting PostgreSQL dump from ${url}`);

    const response = await this.send(url, undefined, PIPELINE_ERROR_CODES.FETCH_FAILED);
    const body = await response.text();
    if (response.status !== 200) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.FETCH_FAILED,
        `Failed to get PostgreSQL dump from ${url} (HTTP ${response.status})`,
        { detail: body }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.FETCH_FAILED,
        `Failed to parse json output from ${url}: ${describeError(error)}`,
        { detail: body, cause: error }
      );
    }

    if (!isProblemResponse(parsed)) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.FETCH_FAILED,
        `Response from ${url} has no "dump" field`,
        { detail: body }
      );
    }
    return parsed.dump;
  }

  /**
   * Posts the answer and returns the raw response text.
   */
  async submitSolution(accessToken: string, payload: AliveSsnsPayload): Promise<string> {
    const url = this.solveUrl(accessToken);
    this.logger.info(`Submitting solution to ${url}`);

    const response = await this.send(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
      PIPELINE_ERROR_CODES.SUBMIT_FAILED
    );
    const body = await response.text();
    if (response.status !== 200) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.SUBMIT_FAILED,
        `Failed to submit solution to ${url} (HTTP ${response.status})`,
        { detail: body }
      );
    }

    this.logger.debug(`Solution submitted to ${url}`);
    return body;
  }

  private async send(url: string, init: RequestInit | undefined, code: PipelineErrorCode): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      throw new PipelineError(code, `Request to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }
}
