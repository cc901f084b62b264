import { z } from "zod";
import { BridgeError } from "./errors.js";

/** Untyped parameter bag as it arrives from the transport. */
export type ParamBag = Readonly<Record<string, unknown>>;

export type ColorTuple = [number, number, number] | [number, number, number, number];
export type Vector2 = [number, number];

const finiteNumber = z.number().finite();
const numberList = z.array(finiteNumber);

export const ParamKindSchemas = {
  string: z.string(),
  number: finiteNumber,
  boolean: z.boolean(),
  color: numberList,
  vector2: numberList,
  mapping: z.record(z.unknown()),
} as const;

export type ParamKind = keyof typeof ParamKindSchemas;

export interface ParamValueByKind {
  string: string;
  number: number;
  boolean: boolean;
  color: ColorTuple;
  vector2: Vector2;
  mapping: Record<string, unknown>;
}

const KIND_LABELS: Record<ParamKind, string> = {
  string: "a string",
  number: "a finite number",
  boolean: "a boolean",
  color: "an array of 3 or 4 numbers",
  vector2: "an array of 2 numbers",
  mapping: "an object",
};

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function expectKind<T>(key: string, kind: ParamKind, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BridgeError(
      "TypeMismatch",
      `Parameter '${key}' must be ${KIND_LABELS[kind]}, got ${describeValue(value)}.`,
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return parsed.data;
}

function toColor(key: string, values: number[]): ColorTuple {
  if (values.length === 3) return [values[0], values[1], values[2]];
  if (values.length === 4) return [values[0], values[1], values[2], values[3]];
  throw new BridgeError(
    "InvalidArity",
    `Parameter '${key}' must have 3 (RGB) or 4 (RGBA) components, but got ${values.length}.`,
  );
}

function toVector2(key: string, values: number[]): Vector2 {
  if (values.length === 2) return [values[0], values[1]];
  throw new BridgeError("InvalidArity", `Parameter '${key}' must have exactly 2 components, but got ${values.length}.`);
}

const decoders: { [K in ParamKind]: (key: string, value: unknown) => ParamValueByKind[K] } = {
  string: (key, value) => expectKind(key, "string", ParamKindSchemas.string, value),
  number: (key, value) => expectKind(key, "number", ParamKindSchemas.number, value),
  boolean: (key, value) => expectKind(key, "boolean", ParamKindSchemas.boolean, value),
  color: (key, value) => toColor(key, expectKind(key, "color", ParamKindSchemas.color, value)),
  vector2: (key, value) => toVector2(key, expectKind(key, "vector2", ParamKindSchemas.vector2, value)),
  mapping: (key, value) => expectKind(key, "mapping", ParamKindSchemas.mapping, value),
};

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

export function decodeParamValue<K extends ParamKind>(key: string, kind: K, value: unknown): ParamValueByKind[K] {
  return decoders[kind](key, value);
}

export function requireParam<K extends ParamKind>(params: ParamBag, key: string, kind: K): ParamValueByKind[K] {
  const value = params[key];
  if (isAbsent(value)) {
    throw new BridgeError("MissingParameter", `Parameter '${key}' is required.`);
  }
  return decodeParamValue(key, kind, value);
}

/**
 * Reads an optional parameter. Absent (`undefined` or `null`) yields the fallback;
 * a present value of the wrong kind still fails with `TypeMismatch`.
 */
export function optionalParam<K extends ParamKind>(params: ParamBag, key: string, kind: K): ParamValueByKind[K] | undefined;
export function optionalParam<K extends ParamKind>(
  params: ParamBag,
  key: string,
  kind: K,
  fallback: ParamValueByKind[K],
): ParamValueByKind[K];
export function optionalParam<K extends ParamKind>(
  params: ParamBag,
  key: string,
  kind: K,
  fallback?: ParamValueByKind[K],
): ParamValueByKind[K] | undefined {
  const value = params[key];
  if (isAbsent(value)) {
    return fallback;
  }
  return decodeParamValue(key, kind, value);
}

export interface ParamSpec<T> {
  key: string;
  kind: ParamKind;
  required: boolean;
  description: string;
  fallback?: unknown;
  read(params: ParamBag): T;
}

export type AnyParamSpec = ParamSpec<unknown>;

/** Declarative parameter specs; `read` goes through the accessor above. */
export const param = {
  required<K extends ParamKind>(key: string, kind: K, description: string): ParamSpec<ParamValueByKind[K]> {
    return {
      key,
      kind,
      required: true,
      description,
      read: (params) => requireParam(params, key, kind),
    };
  },
  optional<K extends ParamKind>(key: string, kind: K, description: string): ParamSpec<ParamValueByKind[K] | undefined> {
    return {
      key,
      kind,
      required: false,
      description,
      read: (params) => optionalParam(params, key, kind),
    };
  },
  withDefault<K extends ParamKind>(
    key: string,
    kind: K,
    fallback: ParamValueByKind[K],
    description: string,
  ): ParamSpec<ParamValueByKind[K]> {
    return {
      key,
      kind,
      required: false,
      description,
      fallback,
      read: (params) => optionalParam(params, key, kind, fallback),
    };
  },
};
