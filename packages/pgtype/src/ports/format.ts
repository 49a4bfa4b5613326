/** Wire format codes of the PostgreSQL extended query protocol. */
export const FormatCodes = {
  Text: 0,
  Binary: 1,
} as const

export type FormatCode = (typeof FormatCodes)[keyof typeof FormatCodes]

export function formatCodeOf(name: string): FormatCode | undefined {
  switch (name) {
    case "text":
      return FormatCodes.Text
    case "binary":
      return FormatCodes.Binary
    default:
      return undefined
  }
}
