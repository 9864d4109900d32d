import type { ILogger } from '@statline/logger'
import type { PageFetcher } from '../../metrics/types.js'

export interface CommandDeps<TNode> {
  fetcher: PageFetcher<TNode>
  /** Receives stdout lines */
  write: (line: string) => void
  logger: ILogger
}
