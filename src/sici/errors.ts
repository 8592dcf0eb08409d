export type SiciErrorCode = "INVALID_MODE" | "EMPTY_INPUT" | "UNSUPPORTED_VERSION" | "INVALID_SICI";

export class SiciError extends Error {
	constructor(
		public code: SiciErrorCode,
		message: string,
	) {
		super(message);
		this.name = "SiciError";
	}
}
