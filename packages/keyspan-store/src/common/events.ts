/**
 * Data change events.
 */

import { createLogger } from './logger.js';

const errorLog = createLogger('events').extend('error');

export interface DataChangeEvent {
	type: 'insert' | 'update' | 'delete';
	key: string;
	/** Feature names assigned by the write, for insert and update events. */
	changedFeatures?: string[];
	/** True when the value itself was written (false for feature-only updates). */
	valueChanged?: boolean;
}

export type DataChangeListener = (event: DataChangeEvent) => void;

/**
 * Simple event emitter for store events.
 */
export class StoreEventEmitter {
	private dataListeners: Set<DataChangeListener> = new Set();

	/**
	 * Subscribe to data change events.
	 * @returns Unsubscribe function.
	 */
	onDataChange(listener: DataChangeListener): () => void {
		this.dataListeners.add(listener);
		return () => {
			this.dataListeners.delete(listener);
		};
	}

	/**
	 * Emit a data change event. A throwing listener is logged and does not stop
	 * delivery to the others.
	 */
	emitDataChange(event: DataChangeEvent): void {
		for (const listener of this.dataListeners) {
			try {
				listener(event);
			} catch (e) {
				errorLog('Data change listener error for %s: %O', event.key, e);
			}
		}
	}

	removeAllListeners(): void {
		this.dataListeners.clear();
	}
}
