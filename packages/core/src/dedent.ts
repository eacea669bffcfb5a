// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Indentation normalization for script fragments written inline in source.
 *
 * The first content line sets the reference indentation `k` (its run of
 * spaces/tabs). Every line from there on loses up to `k` leading spaces/tabs,
 * never more than it has, so indentation beyond `k` is kept. Blank lines
 * before the first content line are dropped.
 *
 * @example
 * ```typescript
 * session.raw(`
 *     plt.plot(x, y)
 *     if show:
 *         plt.show()
 * `);
 * // appends "plt.plot(x, y)\nif show:\n    plt.show()\n"
 * ```
 */

const LINE = /[^\n]*\n|[^\n]+$/g;
const LEADING_WHITESPACE = /^[ \t]*/;
const BLANK_LINE = /^[ \t]*\r?\n?$/;

export function dedent(text: string): string {
  const lines = text.match(LINE) ?? [];
  const first = lines.findIndex((line) => !BLANK_LINE.test(line));
  if (first === -1) {
    return text;
  }

  const reference = indentWidth(lines[first] ?? "");
  if (reference === 0) {
    return text;
  }

  let out = "";
  for (let i = first; i < lines.length; i++) {
    const line = lines[i] ?? "";
    out += line.slice(Math.min(indentWidth(line), reference));
  }
  return out;
}

/**
 * Length of the leading space/tab run of a line.
 */
export function indentWidth(line: string): number {
  return LEADING_WHITESPACE.exec(line)?.[0].length ?? 0;
}
