/**
 * Computes a value on first access and keeps it.
 * A failed computation is not cached; the next access retries and throws again.
 */
export class Cached<T> {
	private state: { computed: true; value: T } | { computed: false } = { computed: false };

	constructor(private readonly compute: () => T) {}

	static of<T>(value: T): Cached<T> {
		const cached = new Cached(() => value);
		cached.state = { computed: true, value };
		return cached;
	}

	get value(): T {
		if (!this.state.computed) {
			this.state = { computed: true, value: this.compute() };
		}
		return this.state.value;
	}

	get hasValue(): boolean {
		return this.state.computed;
	}
}
