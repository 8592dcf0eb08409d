/**
 * Forward-only cursor over a string. Every read consumes; there is no way
 * to step back.
 */
export class Scanner {
	private position = 0;

	constructor(private readonly input: string) {}

	get exhausted(): boolean {
		return this.position >= this.input.length;
	}

	peek(): string | undefined {
		return this.exhausted ? undefined : this.input[this.position];
	}

	/** Consume `char` if it is next in line. */
	accept(char: string): boolean {
		if (this.peek() !== char) return false;
		this.position++;
		return true;
	}

	/** Consume characters while they match `charClass`. */
	takeWhile(charClass: RegExp): string {
		const start = this.position;
		while (!this.exhausted && charClass.test(this.input[this.position])) {
			this.position++;
		}
		return this.input.slice(start, this.position);
	}

	/** Consume everything up to, not including, the next `stop` character. */
	takeUntil(stop: string): string {
		const start = this.position;
		while (!this.exhausted && this.input[this.position] !== stop) {
			this.position++;
		}
		return this.input.slice(start, this.position);
	}

	/** Consume exactly `count` characters, or nothing if fewer remain. */
	take(count: number): string | undefined {
		if (this.position + count > this.input.length) return undefined;
		const taken = this.input.slice(this.position, this.position + count);
		this.position += count;
		return taken;
	}

	/** Skip one character, whatever it is. */
	skip(): void {
		if (!this.exhausted) this.position++;
	}
}
