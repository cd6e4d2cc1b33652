/**
 * Status codes carried by every flatkey error.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	IOERR = 10,
	MISUSE = 21,
	FORMAT = 24,
}
