export {
	allocateStorage,
	BIGINT_RANGES,
	type BigIntKind,
	type BigIntTypedArray,
	type DTypeFamily,
	DTypeKind,
	type DTypeToTS,
	type DTypeValueMap,
	dtypeFamily,
	type FloatKind,
	INTEGER_RANGES,
	isBigIntDType,
	isFloatDType,
	isNumericDType,
	isScalar,
	type NumberTypedArray,
	type NumericKind,
	type Scalar,
	type Value,
} from "./dtypes.ts";
export {
	andThen,
	type Err,
	ERROR_MESSAGES,
	ErrorCode,
	err,
	type FailureCode,
	fail,
	getErrorMessage,
	isErr,
	isOk,
	mapResult,
	type Ok,
	ok,
	type Result,
	toError,
	unwrap,
	unwrapOr,
} from "./error.ts";
