/**
 * HTML Page Fetcher
 *
 * Adapts a Fetcher (raw HTML + status) to the PageFetcher capability: a
 * successful fetch is parsed with cheerio, anything else becomes a FetchError.
 */

import type { ILogger } from '@statline/logger'
import type { Element } from 'domhandler'
import { loggers } from '../../config/logger.js'
import { loadFetchSettings, type FetchSettings } from '../../config/settings.js'
import { CheerioDocumentTree } from '../document/cheerio-tree.js'
import { FetchError } from '../errors.js'
import { NO_RETRY_POLICY, type Fetcher, type FetchOptions, type PageFetcher } from '../types.js'
import { HttpFetcher } from './http-fetcher.js'

export interface HtmlPageFetcherOptions {
  /** Transport (default: HttpFetcher with default options) */
  fetcher?: Fetcher
  /** Per-request options passed to the transport */
  requestOptions?: FetchOptions
  logger?: ILogger
}

export class HtmlPageFetcher implements PageFetcher<Element> {
  private readonly fetcher: Fetcher
  private readonly requestOptions: FetchOptions | undefined
  private readonly log: ILogger

  constructor(options: HtmlPageFetcherOptions = {}) {
    this.fetcher = options.fetcher ?? new HttpFetcher()
    this.requestOptions = options.requestOptions
    this.log = options.logger ?? loggers.fetch
  }

  /**
   * Fetcher wired from METRICS_* settings.
   */
  static fromSettings(settings: FetchSettings = loadFetchSettings()): HtmlPageFetcher {
    return new HtmlPageFetcher({
      fetcher: new HttpFetcher({
        retryPolicy: { ...NO_RETRY_POLICY, maxAttempts: settings.maxAttempts },
      }),
      requestOptions: {
        timeoutMs: settings.timeoutMs,
        maxSizeBytes: settings.maxSizeBytes,
        headers: { 'User-Agent': settings.userAgent },
      },
    })
  }

  async fetch(url: string): Promise<CheerioDocumentTree> {
    const result = await this.fetcher.fetch(url, this.requestOptions)

    if (result.status !== 'ok') {
      this.log.warn('METRICS_FETCH_FAILED', {
        url,
        status: result.status,
        statusCode: result.statusCode,
        durationMs: result.durationMs,
      })
      throw new FetchError(url, result.error ?? `Fetch failed with status ${result.status}`, {
        status: result.status,
        statusCode: result.statusCode,
      })
    }

    this.log.debug('METRICS_FETCH_OK', {
      url,
      statusCode: result.statusCode,
      durationMs: result.durationMs,
    })

    return CheerioDocumentTree.fromHtml(result.html ?? '')
  }
}
