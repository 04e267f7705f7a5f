export type ConversionErrorKind = 'CapacityExceeded' | 'DataMismatch' | 'UnsupportedTransform';

/**
 * Fatal failure of a skeleton or animation conversion. Nothing is written when one is thrown.
 */
export class ConversionError extends Error {
	readonly kind: ConversionErrorKind;

	constructor(kind: ConversionErrorKind, message: string) {
		super(message);
		this.name = 'ConversionError';
		this.kind = kind;
	}
}

export function isConversionError(e: unknown): e is ConversionError {
	return e instanceof ConversionError;
}
