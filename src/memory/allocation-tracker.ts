/**
 * Tracks the sample buffers held by in-flight reads.
 *
 * Every ingestion call opens one task, records each buffer it allocates and
 * releases the task on every exit path. A task still listed after a call has
 * returned is a leak.
 */

/**
 * Task allocation record.
 */
export interface TaskAllocation {
	/** Unique task identifier */
	id: string;
	/** Bytes held by buffers of this task */
	allocatedBytes: number;
	/** Number of buffers registered */
	bufferCount: number;
	/** Task start time (epoch ms) */
	startTime: number;
}

/**
 * Memory usage statistics.
 */
export interface MemoryStats {
	/** Total bytes allocated across all tasks */
	totalAllocatedBytes: number;
	/** Number of active tasks */
	activeTaskCount: number;
	/** Per-task allocations */
	tasks: ReadonlyMap<string, TaskAllocation>;
}

/** Task ID counter */
let taskIdCounter = 0;

/** Active task allocations */
const allocations = new Map<string, TaskAllocation>();

/**
 * Generate a unique task ID.
 */
export function generateTaskId(prefix = "task"): string {
	return `${prefix}_${Date.now()}_${++taskIdCounter}`;
}

/**
 * Record a buffer of `bytes` against a task, opening the task on first use.
 */
export function trackAllocation(taskId: string, bytes: number): void {
	const existing = allocations.get(taskId);
	if (existing) {
		existing.allocatedBytes += bytes;
		existing.bufferCount++;
		return;
	}
	allocations.set(taskId, {
		id: taskId,
		allocatedBytes: bytes,
		bufferCount: 1,
		startTime: Date.now(),
	});
}

/**
 * Release a task's memory allocation.
 */
export function releaseAllocation(taskId: string): void {
	allocations.delete(taskId);
}

/**
 * Get current memory statistics.
 */
export function getMemoryStats(): MemoryStats {
	let totalAllocated = 0;
	for (const alloc of allocations.values()) {
		totalAllocated += alloc.allocatedBytes;
	}

	return {
		totalAllocatedBytes: totalAllocated,
		activeTaskCount: allocations.size,
		tasks: new Map(allocations),
	};
}

/**
 * Clear all allocations (for testing).
 */
export function clearAllAllocations(): void {
	allocations.clear();
}
