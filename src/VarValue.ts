/**
 * Variable values.
 *
 * A variable holds one of five shapes: a number, a string, a numeric array, a
 * numeric matrix, or a table of nested values keyed by name. Values are
 * plain tagged records so they decode straight from registry JSON, e.g.
 * `{ "_tag": "Number", "value": 0.8 }`.
 *
 * @since 0.1.0
 */

import { Option, Schema } from "effect"

/**
 * @since 0.1.0
 * @category Models
 */
export interface NumberValue {
  readonly _tag: "Number"
  readonly value: number
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface StringValue {
  readonly _tag: "String"
  readonly value: string
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface ArrayValue {
  readonly _tag: "Array"
  readonly values: ReadonlyArray<number>
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface MatrixValue {
  readonly _tag: "Matrix"
  readonly rows: ReadonlyArray<ReadonlyArray<number>>
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface TableValue {
  readonly _tag: "Table"
  readonly entries: { readonly [key: string]: VarValue }
}

/**
 * @since 0.1.0
 * @category Models
 */
export type VarValue = NumberValue | StringValue | ArrayValue | MatrixValue | TableValue

/**
 * @since 0.1.0
 * @category Schemas
 */
export const NumberValue = Schema.TaggedStruct("Number", { value: Schema.Number })

/**
 * @since 0.1.0
 * @category Schemas
 */
export const StringValue = Schema.TaggedStruct("String", { value: Schema.String })

/**
 * @since 0.1.0
 * @category Schemas
 */
export const ArrayValue = Schema.TaggedStruct("Array", { values: Schema.Array(Schema.Number) })

/**
 * @since 0.1.0
 * @category Schemas
 */
export const MatrixValue = Schema.TaggedStruct("Matrix", {
  rows: Schema.Array(Schema.Array(Schema.Number)),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export const TableValue: Schema.Schema<TableValue> = Schema.TaggedStruct("Table", {
  entries: Schema.Record({
    key: Schema.String,
    value: Schema.suspend((): Schema.Schema<VarValue> => VarValue),
  }),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export const VarValue: Schema.Schema<VarValue> = Schema.Union(
  NumberValue,
  StringValue,
  ArrayValue,
  MatrixValue,
  TableValue,
)

/**
 * @since 0.1.0
 * @category Guards
 */
export const isVarValue = Schema.is(VarValue)

/**
 * @since 0.1.0
 * @category Constructors
 */
export const numberValue = (value: number): VarValue => ({ _tag: "Number", value })

/**
 * @since 0.1.0
 * @category Constructors
 */
export const stringValue = (value: string): VarValue => ({ _tag: "String", value })

/**
 * @since 0.1.0
 * @category Constructors
 */
export const arrayValue = (values: ReadonlyArray<number>): VarValue => ({ _tag: "Array", values })

/**
 * @since 0.1.0
 * @category Constructors
 */
export const matrixValue = (rows: ReadonlyArray<ReadonlyArray<number>>): VarValue => ({
  _tag: "Matrix",
  rows,
})

/**
 * @since 0.1.0
 * @category Constructors
 */
export const tableValue = (entries: { readonly [key: string]: VarValue }): VarValue => ({
  _tag: "Table",
  entries,
})

/**
 * Handlers for every value shape.
 *
 * @since 0.1.0
 * @category Matching
 */
export interface VarValueCases<R> {
  readonly Number: (value: NumberValue) => R
  readonly String: (value: StringValue) => R
  readonly Array: (value: ArrayValue) => R
  readonly Matrix: (value: MatrixValue) => R
  readonly Table: (value: TableValue) => R
}

/**
 * Exhaustive match on a value's shape.
 *
 * @since 0.1.0
 * @category Matching
 */
export const matchVarValue = <R>(value: VarValue, cases: VarValueCases<R>): R => {
  switch (value._tag) {
    case "Number":
      return cases.Number(value)
    case "String":
      return cases.String(value)
    case "Array":
      return cases.Array(value)
    case "Matrix":
      return cases.Matrix(value)
    case "Table":
      return cases.Table(value)
  }
}

/**
 * The number held by a `Number` value.
 *
 * @since 0.1.0
 * @category Accessors
 */
export const asNumber = (value: VarValue | undefined): Option.Option<number> =>
  value !== undefined && value._tag === "Number" ? Option.some(value.value) : Option.none()

const renderNumbers = (values: ReadonlyArray<number>): string => `[${values.map(String).join(", ")}]`

/**
 * Stable single-line rendering. Table keys are sorted so the output does not
 * depend on insertion order.
 *
 * @since 0.1.0
 * @category Rendering
 */
export const renderVarValue = (value: VarValue): string =>
  matchVarValue(value, {
    Number: ({ value }) => String(value),
    String: ({ value }) => JSON.stringify(value),
    Array: ({ values }) => renderNumbers(values),
    Matrix: ({ rows }) => `[${rows.map(renderNumbers).join(", ")}]`,
    Table: ({ entries }) => {
      const keys = Object.keys(entries).sort()
      const body = keys.flatMap((key) => {
        const entry = entries[key]
        return entry === undefined ? [] : [`${key}: ${renderVarValue(entry)}`]
      })
      return `{${body.join(", ")}}`
    },
  })
