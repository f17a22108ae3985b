export interface SourcePosition {
	offset: number;
	line: number;
	column: number;
}

/** Raised when a BibTeX database (or one of its fields) is malformed. */
export class DatabaseFormatError extends Error {
	readonly position?: SourcePosition;
	readonly expected?: string;

	constructor(message: string, position?: SourcePosition, expected?: string) {
		super(message);
		this.name = "DatabaseFormatError";
		this.position = position;
		this.expected = expected;
	}
}

export class JournalFormatError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "JournalFormatError";
	}
}
