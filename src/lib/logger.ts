/**
 * LogTape categories used by the library. Sinks are configured by the
 * application with `configure()` from `@logtape/logtape`; until then records
 * are discarded.
 *
 * @module packet-link/logger
 */

import { getLogger, type Logger } from '@logtape/logtape'

export const LOG_CATEGORY = 'packet-link'

export type LogComponent = 'link' | 'receiver' | 'decoder'

export function getLinkLogger (component: LogComponent): Logger {
  return getLogger([LOG_CATEGORY, component])
}
