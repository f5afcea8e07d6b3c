/** Lines of `text` from `offset`, at most `height` of them */
export function paneLines(text: string, offset: number, height: number): string[] {
  if (height <= 0) return []
  return text.split('\n').slice(offset, offset + height)
}
