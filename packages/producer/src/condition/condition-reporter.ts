/**
 * Reports conditions attached to protocol events
 */

import type { Logger } from '../logger.js'
import { withGrowingCapacity } from '../utils/grow-retry.js'
import type { Condition } from './condition.js'
import { formatInfo } from './format-info.js'

export const INITIAL_INFO_CAPACITY = 128

export interface ConditionReporterOptions {
	logger: Logger

	/** Mark the run as failed */
	markFailed: () => void

	/** Ask the connection the event belongs to to start closing */
	requestClose: () => void
}

export class ConditionReporter {
	private readonly logger: Logger
	private readonly markFailed: () => void
	private readonly requestClose: () => void

	constructor(options: ConditionReporterOptions) {
		this.logger = options.logger
		this.markFailed = options.markFailed
		this.requestClose = options.requestClose
	}

	/**
	 * Log `condition` if set, then fail the run and start closing.
	 *
	 * Returns whether a condition was reported. The event loop keeps running
	 * so the close handshake can complete.
	 */
	report(eventType: string, condition: Condition | undefined): boolean {
		if (!condition) {
			return false
		}

		const description = condition.description ?? ''
		this.logger.error(`${eventType}: ${condition.name}: ${description}`, {
			event: eventType,
			condition: condition.name,
			description,
		})

		if (condition.info !== undefined && condition.info !== null) {
			const info = withGrowingCapacity(INITIAL_INFO_CAPACITY, capacity => formatInfo(condition.info, capacity))
			this.logger.error(`Err info: ${info}`, { event: eventType, condition: condition.name, info })
		}

		this.requestClose()
		this.markFailed()
		return true
	}
}
