/**
 * Status codes carried by every Keyspan error.
 * Values follow the SQLite result code numbering.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	CORRUPT = 11,
	NOTFOUND = 12,
	CANTOPEN = 14,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
}
