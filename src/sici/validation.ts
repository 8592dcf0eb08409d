/** One or more human-readable problem descriptions for a single attribute. */
export type ProblemMessages = [string, ...string[]];

export type ProblemMap<A extends string> = Partial<Record<A, string[]>>;

/**
 * Per-segment bookkeeping of validation problems, keyed by attribute name.
 * An attribute without an entry has no known problem.
 */
export class ValidationTracker<A extends string> {
	private readonly problems = new Map<A, string[]>();

	/** Replace (not append to) the problem entry for `attr`. */
	record(attr: A, messages: ProblemMessages): void {
		this.problems.set(attr, [...messages]);
	}

	clear(attr: A): void {
		this.problems.delete(attr);
	}

	clearAll(): void {
		this.problems.clear();
	}

	list(): ProblemMap<A> {
		const snapshot: ProblemMap<A> = {};
		for (const [attr, messages] of this.problems) {
			snapshot[attr] = [...messages];
		}
		return snapshot;
	}

	isClean(): boolean {
		for (const messages of this.problems.values()) {
			if (messages.length > 0) return false;
		}
		return true;
	}
}
