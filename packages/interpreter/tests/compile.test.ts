import { Decimal } from "decimal.js"
import { afterEach, describe, expect, it, vi } from "vitest"
import {
  INVALID_SPAN_CONTEXT,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api"
import {
  OpenTelemetryTracer,
  globalTracerRegistry,
  setTracingEnabled,
} from "@termcmp/tracing"
import {
  ComparisonType,
  InvalidOptionValueError,
  MissingColumnError,
  SqlTypes,
  UnsupportedComparisonError,
  UnsupportedConversionError,
  column,
  compileComparison,
  literal,
  operand,
} from "../src/index.js"
import type { Span, SpanAttributes, Tracer } from "@termcmp/tracing"
import type {
  EvaluationContext,
  Operand,
  SqlType,
  SqlValue,
} from "../src/index.js"

const context: EvaluationContext = { row: {} }

function lit(value: SqlValue, type: SqlType): Operand {
  return operand(literal(value, type))
}

function evaluate(
  operator: string,
  left: Operand,
  right: Operand,
  row: Record<string, unknown> = {}
): boolean {
  return compileComparison(operator, left, right).getValue({ row })
}

describe(`compileComparison`, () => {
  describe(`IS_DISTINCT_FROM`, () => {
    const a = operand(column(`a`, SqlTypes.INTEGER))
    const b = operand(column(`b`, SqlTypes.INTEGER))
    const term = compileComparison(ComparisonType.IS_DISTINCT_FROM, a, b)

    it.each<{ row: Record<string, SqlValue>; expected: boolean }>([
      { row: { a: null, b: null }, expected: false },
      { row: { a: null, b: 5 }, expected: true },
      { row: { a: 5, b: null }, expected: true },
      { row: { a: 5, b: 5 }, expected: false },
      { row: { a: 5, b: 6 }, expected: true },
    ])(`is $expected for a=$row.a, b=$row.b`, ({ row, expected }) => {
      expect(term.getValue({ row })).toBe(expected)
    })
  })

  describe(`null handling`, () => {
    it.each([
      ComparisonType.EQUAL,
      ComparisonType.NOT_EQUAL,
      ComparisonType.LESS_THAN,
      ComparisonType.LESS_THAN_OR_EQUAL,
      ComparisonType.GREATER_THAN,
      ComparisonType.GREATER_THAN_OR_EQUAL,
    ])(`%s is false when an operand is null`, (operator) => {
      const left = operand(column(`left`, SqlTypes.decimal(4, 2)))
      const right = operand(column(`right`, SqlTypes.STRING))
      const term = compileComparison(operator, left, right)

      expect(term.getValue({ row: { left: null, right: `1.00` } })).toBe(false)
      expect(term.getValue({ row: { left: new Decimal(1), right: null } })).toBe(
        false
      )
    })

    it(`does not convert the other operand when one side is null`, () => {
      // "abc" would fail the decimal conversion if it were attempted
      expect(
        evaluate(
          ComparisonType.LESS_THAN,
          lit(null, SqlTypes.decimal(4, 2)),
          lit(`abc`, SqlTypes.STRING)
        )
      ).toBe(false)
    })
  })

  describe(`decimal precedence`, () => {
    const decimalType = SqlTypes.decimal(3, 2)

    it(`coerces the integer operand to decimal`, () => {
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(new Decimal(`1.50`), decimalType),
          lit(1, SqlTypes.INTEGER)
        )
      ).toBe(false)
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(new Decimal(`1.00`), decimalType),
          lit(1, SqlTypes.INTEGER)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.GREATER_THAN,
          lit(2, SqlTypes.INTEGER),
          lit(new Decimal(`1.99`), decimalType)
        )
      ).toBe(true)
    })
  })

  describe(`timestamp precedence`, () => {
    const instant = new Date(Date.UTC(2024, 2, 1))

    it(`parses the string operand as a timestamp`, () => {
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(instant, SqlTypes.TIMESTAMP),
          lit(`2024-03-01T00:00:00.000Z`, SqlTypes.STRING)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.LESS_THAN,
          lit(instant, SqlTypes.TIMESTAMP),
          lit(`2024-03-01 00:00:01`, SqlTypes.STRING)
        )
      ).toBe(true)
    })

    it(`raises a conversion error for unparsable text at evaluation time`, () => {
      const term = compileComparison(
        ComparisonType.EQUAL,
        lit(instant, SqlTypes.TIMESTAMP),
        lit(`yesterday`, SqlTypes.STRING)
      )

      expect(() => term.getValue(context)).toThrow(UnsupportedConversionError)
      expect(() => term.getValue(context)).toThrow(
        `Unsupported conversion from STRING to TIMESTAMP`
      )
    })

    it(`honours the configured time zone`, () => {
      const term = compileComparison(
        ComparisonType.EQUAL,
        lit(new Date(Date.UTC(2024, 2, 1, 5)), SqlTypes.TIMESTAMP),
        lit(`2024-03-01T00:00`, SqlTypes.STRING),
        { timeZone: `America/New_York` }
      )

      expect(term.getValue(context)).toBe(true)
    })
  })

  describe(`scalar orderings`, () => {
    it(`compares a left string operand as text`, () => {
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(`true`, SqlTypes.STRING),
          lit(true, SqlTypes.BOOLEAN)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.LESS_THAN,
          lit(`10`, SqlTypes.STRING),
          lit(9, SqlTypes.INTEGER)
        )
      ).toBe(true)
    })

    it(`orders negative zero below zero for doubles`, () => {
      const negativeZero = lit(-0, SqlTypes.DOUBLE)
      const zero = lit(0, SqlTypes.DOUBLE)

      expect(evaluate(ComparisonType.EQUAL, negativeZero, zero)).toBe(false)
      expect(evaluate(ComparisonType.LESS_THAN, negativeZero, zero)).toBe(true)
    })

    it(`mixes bigint and double operands`, () => {
      expect(
        evaluate(
          ComparisonType.LESS_THAN_OR_EQUAL,
          lit(3n, SqlTypes.BIGINT),
          lit(3.5, SqlTypes.DOUBLE)
        )
      ).toBe(true)
    })

    it(`compares integers`, () => {
      expect(
        evaluate(
          ComparisonType.GREATER_THAN_OR_EQUAL,
          lit(7, SqlTypes.INTEGER),
          lit(7, SqlTypes.INTEGER)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.NOT_EQUAL,
          lit(7, SqlTypes.INTEGER),
          lit(8, SqlTypes.INTEGER)
        )
      ).toBe(true)
    })
  })

  describe(`structural equality`, () => {
    const arrayType = SqlTypes.array(SqlTypes.INTEGER)
    const structType = SqlTypes.struct([
      { name: `A`, type: SqlTypes.INTEGER },
      { name: `B`, type: SqlTypes.STRING },
    ])

    it(`compares arrays element by element in order`, () => {
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit([1, 2, 3], arrayType),
          lit([1, 2, 3], arrayType)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit([1, 2], arrayType),
          lit([2, 1], arrayType)
        )
      ).toBe(false)
    })

    it(`compares structs field by field`, () => {
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit({ A: 1, B: `x` }, structType),
          lit({ B: `x`, A: 1 }, structType)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.NOT_EQUAL,
          lit({ A: 1, B: `x` }, structType),
          lit({ A: 1, B: `y` }, structType)
        )
      ).toBe(true)
    })

    it(`matches map keys that are decimals or timestamps by value`, () => {
      const byDecimal = SqlTypes.map(SqlTypes.decimal(4, 2), SqlTypes.INTEGER)
      const byTimestamp = SqlTypes.map(SqlTypes.TIMESTAMP, SqlTypes.INTEGER)

      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(new Map([[new Decimal(`1.5`), 1]]), byDecimal),
          lit(new Map([[new Decimal(`1.50`), 1]]), byDecimal)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(new Map([[new Date(0), 1]]), byTimestamp),
          lit(new Map([[new Date(0), 1]]), byTimestamp)
        )
      ).toBe(true)
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit(new Map([[new Date(0), 1]]), byTimestamp),
          lit(new Map([[new Date(1), 1]]), byTimestamp)
        )
      ).toBe(false)
    })

    it(`compares booleans through the equality path`, () => {
      expect(
        evaluate(
          ComparisonType.IS_DISTINCT_FROM,
          lit(true, SqlTypes.BOOLEAN),
          lit(false, SqlTypes.BOOLEAN)
        )
      ).toBe(true)
    })

    it(`has no ordering for structs`, () => {
      expect(() =>
        compileComparison(
          ComparisonType.LESS_THAN,
          lit({ A: 1, B: `x` }, structType),
          lit({ A: 2, B: `x` }, structType)
        )
      ).toThrow(
        `Unsupported comparison between STRUCT<\`A\` INTEGER, \`B\` STRING> and STRUCT<\`A\` INTEGER, \`B\` STRING>: LESS_THAN`
      )
    })

    it(`compares mismatched declared types leniently by default`, () => {
      expect(
        evaluate(
          ComparisonType.EQUAL,
          lit([1], arrayType),
          lit([`1`], SqlTypes.array(SqlTypes.STRING))
        )
      ).toBe(false)
    })

    it(`rejects mismatched declared types in strict mode`, () => {
      expect(() =>
        compileComparison(
          ComparisonType.EQUAL,
          lit([1], arrayType),
          lit([`1`], SqlTypes.array(SqlTypes.STRING)),
          { equalityTypeCheck: `strict` }
        )
      ).toThrow(
        new UnsupportedComparisonError(
          arrayType,
          SqlTypes.array(SqlTypes.STRING),
          ComparisonType.EQUAL
        )
      )
    })

    it(`accepts identical declared types in strict mode`, () => {
      const term = compileComparison(
        ComparisonType.EQUAL,
        lit([1], arrayType),
        lit([1], SqlTypes.array(SqlTypes.INTEGER)),
        { equalityTypeCheck: `strict` }
      )
      expect(term.getValue(context)).toBe(true)
    })
  })

  describe(`compile-time errors`, () => {
    it(`rejects operators outside the comparison set`, () => {
      let caught: unknown
      try {
        compileComparison(
          `LIKE`,
          lit(1, SqlTypes.INTEGER),
          lit(2, SqlTypes.BIGINT)
        )
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(UnsupportedComparisonError)
      if (caught instanceof UnsupportedComparisonError) {
        expect(caught.message).toBe(
          `Unsupported comparison between INTEGER and BIGINT: LIKE`
        )
        expect(caught.operator).toBe(`LIKE`)
        expect(caught.leftType).toBe(SqlTypes.INTEGER)
        expect(caught.rightType).toBe(SqlTypes.BIGINT)
      }
    })

    it(`validates options before resolving`, () => {
      expect(() =>
        compileComparison(
          ComparisonType.EQUAL,
          lit(1, SqlTypes.INTEGER),
          lit(1, SqlTypes.INTEGER),
          { timeZone: `Mars/Olympus` }
        )
      ).toThrow(InvalidOptionValueError)
    })
  })

  describe(`column terms`, () => {
    it(`reads operands from each row`, () => {
      const term = compileComparison(
        ComparisonType.GREATER_THAN,
        operand(column(`price`, SqlTypes.DOUBLE)),
        operand(column(`limit`, SqlTypes.INTEGER))
      )

      expect(term.getValue({ row: { price: 10.5, limit: 10 } })).toBe(true)
      expect(term.getValue({ row: { price: 9.5, limit: 10 } })).toBe(false)
    })

    it(`raises when the row does not carry the column`, () => {
      const term = compileComparison(
        ComparisonType.EQUAL,
        operand(column(`missing`, SqlTypes.INTEGER)),
        lit(1, SqlTypes.INTEGER)
      )

      expect(() => term.getValue(context)).toThrow(MissingColumnError)
      expect(() => term.getValue(context)).toThrow(
        `Column "missing" is not present in the evaluated row`
      )
    })
  })

  it(`compiles the same comparison to equivalent terms`, () => {
    const left = operand(column(`x`, SqlTypes.BIGINT))
    const right = operand(column(`y`, SqlTypes.DOUBLE))
    const first = compileComparison(ComparisonType.LESS_THAN, left, right)
    const second = compileComparison(ComparisonType.LESS_THAN, left, right)

    const rows: Array<Record<string, SqlValue>> = [
      { x: 1n, y: 1.5 },
      { x: 2n, y: 1.5 },
      { x: null, y: 1.5 },
      { x: 3n, y: Number.NaN },
      { x: -4n, y: -4 },
    ]
    expect(rows.map((row) => first.getValue({ row }))).toEqual([
      true,
      false,
      false,
      true,
      false,
    ])
    expect(rows.map((row) => second.getValue({ row }))).toEqual(
      rows.map((row) => first.getValue({ row }))
    )
  })
})

describe(`compileComparison tracing`, () => {
  class RecordingTracer implements Tracer {
    spans: Array<{
      name: string
      attributes?: SpanAttributes
      errors: Array<unknown>
    }> = []

    startSpan(name: string, attributes?: SpanAttributes): Span {
      const errors: Array<unknown> = []
      this.spans.push({ name, attributes, errors })
      return {
        name,
        end: () => {},
        setAttributes: () => {},
        recordError: (error) => {
          errors.push(error)
        },
      }
    }
  }

  afterEach(() => {
    setTracingEnabled(false)
    globalTracerRegistry.clearTracers()
    vi.restoreAllMocks()
  })

  it(`records one span per compiled comparison`, () => {
    const tracer = new RecordingTracer()
    setTracingEnabled(true)
    globalTracerRegistry.addTracer(tracer)

    compileComparison(
      ComparisonType.LESS_THAN,
      lit(1, SqlTypes.INTEGER),
      lit(new Decimal(2), SqlTypes.decimal(4, 2))
    )

    expect(tracer.spans).toEqual([
      {
        name: `termcmp.compileComparison`,
        attributes: {
          operator: `LESS_THAN`,
          leftType: `INTEGER`,
          rightType: `DECIMAL(4, 2)`,
        },
        errors: [],
      },
    ])
  })

  it(`records an unsupported comparison on the span before rethrowing`, () => {
    const tracer = new RecordingTracer()
    setTracingEnabled(true)
    globalTracerRegistry.addTracer(tracer)

    expect(() =>
      compileComparison(
        ComparisonType.LESS_THAN,
        lit(true, SqlTypes.BOOLEAN),
        lit(false, SqlTypes.BOOLEAN)
      )
    ).toThrow(UnsupportedComparisonError)

    expect(tracer.spans).toHaveLength(1)
    const [error] = tracer.spans[0]?.errors ?? []
    expect(error).toBeInstanceOf(UnsupportedComparisonError)
    expect(error instanceof Error ? error.message : undefined).toBe(
      `Unsupported comparison between BOOLEAN and BOOLEAN: LESS_THAN`
    )
  })

  it(`records nothing while tracing is disabled`, () => {
    const tracer = new RecordingTracer()
    globalTracerRegistry.addTracer(tracer)

    compileComparison(
      ComparisonType.EQUAL,
      lit(1, SqlTypes.INTEGER),
      lit(1, SqlTypes.INTEGER)
    )

    expect(tracer.spans).toEqual([])
  })

  it(`marks the OpenTelemetry span as failed for an unsupported comparison`, () => {
    const otelTracer = trace.getTracer(`termcmp-interpreter-tests`)
    const otelSpan = trace.wrapSpanContext(INVALID_SPAN_CONTEXT)
    const startSpan = vi
      .spyOn(otelTracer, `startSpan`)
      .mockImplementation(() => otelSpan)
    const setStatus = vi.spyOn(otelSpan, `setStatus`)
    const end = vi.spyOn(otelSpan, `end`)
    setTracingEnabled(true)
    globalTracerRegistry.addTracer(new OpenTelemetryTracer(otelTracer))

    expect(() =>
      compileComparison(
        ComparisonType.GREATER_THAN_OR_EQUAL,
        lit([1], SqlTypes.array(SqlTypes.INTEGER)),
        lit([2], SqlTypes.array(SqlTypes.INTEGER))
      )
    ).toThrow(UnsupportedComparisonError)

    expect(startSpan).toHaveBeenCalledWith(
      `termcmp.compileComparison`,
      {
        attributes: {
          operator: `GREATER_THAN_OR_EQUAL`,
          leftType: `ARRAY<INTEGER>`,
          rightType: `ARRAY<INTEGER>`,
        },
      },
      expect.anything()
    )
    expect(setStatus).toHaveBeenCalledWith({
      code: SpanStatusCode.ERROR,
      message: `Unsupported comparison between ARRAY<INTEGER> and ARRAY<INTEGER>: GREATER_THAN_OR_EQUAL`,
    })
    expect(end).toHaveBeenCalledTimes(1)
  })
})
