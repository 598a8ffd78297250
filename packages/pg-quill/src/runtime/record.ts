/**
 * Record and array literals
 *
 * PostgreSQL sends composite values in their text form, `(a,"b c",,"x""y")`,
 * and reads them back the same way. An unquoted empty field is NULL; a
 * quoted empty field is the empty string.
 */
import { DecodeError } from "./errors.js"

/** Split a record literal into its raw field texts */
export function parseRecord(text: string): Array<string | null> {
  if (!text.startsWith("(") || !text.endsWith(")")) {
    throw new DecodeError({ message: "record literal must be enclosed in parentheses", input: text })
  }
  const fields: Array<string | null> = []
  const end = text.length - 1
  let i = 1

  for (;;) {
    let value = ""
    let quoted = false
    while (i < end && text[i] !== ",") {
      const ch = text.charAt(i)
      if (ch === '"') {
        quoted = true
        i++
        while (i < end) {
          const c = text.charAt(i)
          if (c === '"') {
            if (text[i + 1] === '"') {
              value += '"'
              i += 2
              continue
            }
            i++
            break
          }
          if (c === "\\") {
            value += text.charAt(i + 1)
            i += 2
            continue
          }
          value += c
          i++
        }
      } else if (ch === "\\") {
        value += text.charAt(i + 1)
        i += 2
      } else {
        value += ch
        i++
      }
    }
    fields.push(quoted || value.length > 0 ? value : null)
    if (i >= end) return fields
    i++ // ","
  }
}

const NEEDS_QUOTES = /^$|[",\\()\s]/

const quoteField = (value: string): string =>
  NEEDS_QUOTES.test(value) ? `"${value.replace(/["\\]/g, ch => ch + ch)}"` : value

/** Write field texts as a record literal; null fields are left empty */
export function writeRecord(fields: ReadonlyArray<string | null>): string {
  return `(${fields.map(f => (f === null ? "" : quoteField(f))).join(",")})`
}

/** Write element texts as a one-dimensional array literal */
export function writeArray(elements: ReadonlyArray<string | null>): string {
  return `{${elements.map(e => (e === null ? "NULL" : `"${e.replace(/["\\]/g, ch => `\\${ch}`)}"`)).join(",")}}`
}
