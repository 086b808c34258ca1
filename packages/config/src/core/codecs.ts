import { z } from "zod"
import type { ValueCodec } from "../ports/descriptor"

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Bridges a zod schema that parses a string into a {@link ValueCodec}.
 * Issue messages become the conversion error.
 */
export function zodCodec<A>(
  kind: string,
  schema: z.ZodType<A, string>,
  encode: (value: A) => string,
): ValueCodec<A> {
  return {
    kind,
    decode: (raw) => {
      const result = schema.safeParse(raw)

      if (result.success) return { success: true, value: result.data }

      return {
        success: false,
        error: result.error.issues.map((issue) => issue.message).join("; "),
      }
    },
    encode,
  }
}

export const stringCodec: ValueCodec<string> = {
  kind: "string",
  decode: (raw) => ({ success: true, value: raw }),
  encode: (value) => value,
}

export const intCodec = zodCodec<number>(
  "int",
  z
    .string()
    .trim()
    .regex(INTEGER, "expected an integer")
    .transform(Number)
    .pipe(z.number().int("expected a safe integer")),
  String,
)

export const numberCodec = zodCodec<number>(
  "number",
  z.string().trim().regex(DECIMAL, "expected a number").transform(Number).pipe(z.number()),
  String,
)

export const booleanCodec = zodCodec<boolean>("boolean", z.stringbool(), String)

export const bigintCodec = zodCodec<bigint>(
  "bigint",
  z
    .string()
    .trim()
    .regex(INTEGER, "expected an integer")
    .transform((s) => BigInt(s)),
  String,
)

export const urlCodec = zodCodec<string>(
  "url",
  z.string().trim().pipe(z.url("expected a URL")),
  String,
)

export const uuidCodec = zodCodec<string>(
  "uuid",
  z.string().trim().pipe(z.uuid("expected a UUID")),
  String,
)
