import { z } from "zod";
import type { ToolResult, ToolSpec } from "../../types/tools.js";

const num = z.coerce.number().refine(Number.isFinite, "must be a finite number");
const int = z.coerce.number().int("must be an integer");

function mathTool<T extends z.ZodTypeAny>(
  name: string,
  description: string,
  schema: T,
  input_schema: Record<string, string>,
  fn: (args: z.infer<T>) => unknown
): ToolSpec {
  return {
    name,
    description,
    input_schema,
    output_schema: { result: "number" },
    async invoke(args): Promise<ToolResult> {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const msg = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        return { name, ok: false, output: null, error: `invalid arguments: ${msg}` };
      }
      try {
        return { name, ok: true, output: fn(parsed.data) };
      } catch (e) {
        return { name, ok: false, output: null, error: e instanceof Error ? e.message : String(e) };
      }
    }
  };
}

const ab = z.object({ a: num, b: num });
const abDoc = { a: "number", b: "number" };

export const add = mathTool("add", "Add two numbers", ab, abDoc, ({ a, b }) => a + b);
export const subtract = mathTool("subtract", "Subtract b from a", ab, abDoc, ({ a, b }) => a - b);
export const multiply = mathTool("multiply", "Multiply two numbers", ab, abDoc, ({ a, b }) => a * b);

export const divide = mathTool("divide", "Divide a by b", ab, abDoc, ({ a, b }) => {
  if (b === 0) throw new Error("division by zero");
  return a / b;
});

export const power = mathTool("power", "Raise a to the power b", ab, abDoc, ({ a, b }) => a ** b);

export const remainder = mathTool("remainder", "Remainder of a divided by b", ab, abDoc, ({ a, b }) => {
  if (b === 0) throw new Error("division by zero");
  return a % b;
});

export const sqrt = mathTool("sqrt", "Square root of a", z.object({ a: num }), { a: "number" }, ({ a }) => {
  if (a < 0) throw new Error("square root of a negative number");
  return Math.sqrt(a);
});

export const cbrt = mathTool("cbrt", "Cube root of a", z.object({ a: num }), { a: "number" }, ({ a }) => Math.cbrt(a));

export const factorial = mathTool("factorial", "Factorial of a non-negative integer a", z.object({ a: int }), { a: "integer" }, ({ a }) => {
  if (a < 0) throw new Error("factorial of a negative number");
  if (a > 170) throw new Error("factorial overflows above 170");
  let r = 1;
  for (let i = 2; i <= a; i++) r *= i;
  return r;
});

export const sin = mathTool("sin", "Sine of a (radians)", z.object({ a: num }), { a: "number (radians)" }, ({ a }) => Math.sin(a));
export const cos = mathTool("cos", "Cosine of a (radians)", z.object({ a: num }), { a: "number (radians)" }, ({ a }) => Math.cos(a));
export const tan = mathTool("tan", "Tangent of a (radians)", z.object({ a: num }), { a: "number (radians)" }, ({ a }) => Math.tan(a));

export const fibonacciNumbers = mathTool(
  "fibonacci_numbers",
  "First n Fibonacci numbers",
  z.object({ n: int }),
  { n: "integer (count)" },
  ({ n }) => {
    if (n < 0) throw new Error("n must not be negative");
    const out: number[] = [];
    for (let i = 0; i < n; i++) out.push(i < 2 ? i : out[i - 1] + out[i - 2]);
    return out;
  }
);

export const stringsToCharsToInt = mathTool(
  "strings_to_chars_to_int",
  "ASCII codes of the characters of a string",
  z.object({ string: z.string() }),
  { string: "string" },
  ({ string }) => Array.from(string, c => c.charCodeAt(0))
);

export const intListToExponentialSum = mathTool(
  "int_list_to_exponential_sum",
  "Sum of e raised to each integer in a list",
  z.object({ numbers: z.array(int) }),
  { numbers: "integer[]" },
  ({ numbers }) => numbers.reduce((acc, n) => acc + Math.exp(n), 0)
);

export const calculatorTools: ToolSpec[] = [
  add, subtract, multiply, divide, power, remainder,
  sqrt, cbrt, factorial, sin, cos, tan,
  fibonacciNumbers, stringsToCharsToInt, intListToExponentialSum
];
