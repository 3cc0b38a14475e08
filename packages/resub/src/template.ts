export type TextToken = {
  kind: "text";
  value: string;
};

export type GroupToken = {
  kind: "group";
  /** Group number (0 is the whole match) or group name. */
  ref: number | string;
};

export type TemplateToken = TextToken | GroupToken;

export type CompiledReplacementTemplate = {
  source: string;
  tokens: TemplateToken[];
};

export type TemplateGroups = {
  count: number;
  names: readonly string[];
};

export class TemplateSyntaxError extends Error {
  readonly name = "TemplateSyntaxError";

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, TemplateSyntaxError.prototype);
  }
}

const BACKSLASH_ESCAPES: Record<string, string> = {
  "\\": "\\",
  n: "\n",
  r: "\r",
  t: "\t",
};

const NAMED_REF_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Tokenizes a replacement template. Supported references:
 *
 * - `\1`..`\99`, `\g<1>`, `\g<name>` and `\g<0>` for the whole match
 * - `$1`..`$99`, `$<name>`, `$&` for the whole match and `$$` for a dollar;
 *   a `$` reference to a group the pattern lacks is kept as literal text
 *
 * Two-digit numbers are read as one reference only when the pattern defines
 * that many groups, so `\10` is group 1 followed by "0" in a one-group pattern.
 * Any other backslash sequence is kept as written.
 */
export function compileReplacementTemplate(
  source: string,
  groups: TemplateGroups,
): CompiledReplacementTemplate {
  const tokens: TemplateToken[] = [];
  let text = "";
  let index = 0;

  const pushGroup = (ref: number | string) => {
    if (text.length > 0) {
      tokens.push({ kind: "text", value: text });
      text = "";
    }
    tokens.push({ kind: "group", ref });
  };

  while (index < source.length) {
    const char = source.charAt(index);
    const next = source.charAt(index + 1);

    if (char === "\\") {
      if (isDigit(next) && next !== "0") {
        const { ref, length } = readNumberedRef(source, index + 1, groups);
        pushGroup(ref);
        index += 1 + length;
        continue;
      }
      if (next === "g" && source.charAt(index + 2) === "<") {
        const { ref, end } = readBracketedRef(source, index + 3, "\\g<", groups);
        pushGroup(ref);
        index = end + 1;
        continue;
      }
      const escaped = BACKSLASH_ESCAPES[next];
      if (escaped !== undefined) {
        text += escaped;
        index += 2;
        continue;
      }
      text += char;
      index += 1;
      continue;
    }

    if (char === "$") {
      if (next === "$") {
        text += "$";
        index += 2;
        continue;
      }
      if (next === "&") {
        pushGroup(0);
        index += 2;
        continue;
      }
      // A dollar that names no group of the pattern stays literal.
      const numbered = isDigit(next) ? matchNumberedRef(source, index + 1, groups) : undefined;
      if (numbered) {
        pushGroup(numbered.ref);
        index += 1 + numbered.length;
        continue;
      }
      const named = next === "<" ? matchDollarNamedRef(source, index + 2, groups) : undefined;
      if (named) {
        pushGroup(named.ref);
        index = named.end + 1;
        continue;
      }
    }

    text += char;
    index += 1;
  }

  if (text.length > 0) {
    tokens.push({ kind: "text", value: text });
  }

  return { source, tokens };
}

export function renderCompiledTemplate(
  template: CompiledReplacementTemplate,
  match: RegExpMatchArray,
): string {
  let rendered = "";
  for (const token of template.tokens) {
    if (token.kind === "text") {
      rendered += token.value;
      continue;
    }

    // Groups that did not take part in the match render as "".
    const value = typeof token.ref === "number" ? match[token.ref] : match.groups?.[token.ref];
    rendered += value ?? "";
  }
  return rendered;
}

function matchNumberedRef(
  source: string,
  start: number,
  groups: TemplateGroups,
): { ref: number; length: number } | undefined {
  const first = Number(source.charAt(start));
  const second = source.charAt(start + 1);
  if (isDigit(second)) {
    const twoDigit = first * 10 + Number(second);
    if (twoDigit >= 1 && twoDigit <= groups.count) {
      return { ref: twoDigit, length: 2 };
    }
  }

  if (first < 1 || first > groups.count) {
    return undefined;
  }
  return { ref: first, length: 1 };
}

function readNumberedRef(
  source: string,
  start: number,
  groups: TemplateGroups,
): { ref: number; length: number } {
  const numbered = matchNumberedRef(source, start, groups);
  if (!numbered) {
    const first = Number(source.charAt(start));
    throw new TemplateSyntaxError(
      `invalid group reference ${first}: pattern defines ${groups.count} ${groups.count === 1 ? "group" : "groups"}`,
    );
  }
  return numbered;
}

function matchDollarNamedRef(
  source: string,
  start: number,
  groups: TemplateGroups,
): { ref: string; end: number } | undefined {
  const end = source.indexOf(">", start);
  if (end < 0) {
    return undefined;
  }
  const name = source.slice(start, end);
  return groups.names.includes(name) ? { ref: name, end } : undefined;
}

function readBracketedRef(
  source: string,
  start: number,
  opener: string,
  groups: TemplateGroups,
): { ref: number | string; end: number } {
  const end = source.indexOf(">", start);
  if (end < 0) {
    throw new TemplateSyntaxError(`missing ">" after ${opener}`);
  }

  const body = source.slice(start, end);
  if (/^\d+$/.test(body)) {
    const ref = Number(body);
    if (ref > groups.count) {
      throw new TemplateSyntaxError(
        `invalid group reference ${ref}: pattern defines ${groups.count} ${groups.count === 1 ? "group" : "groups"}`,
      );
    }
    return { ref, end };
  }

  if (!NAMED_REF_PATTERN.test(body)) {
    throw new TemplateSyntaxError(`bad group name ${JSON.stringify(body)}`);
  }
  if (!groups.names.includes(body)) {
    throw new TemplateSyntaxError(`unknown group name ${JSON.stringify(body)}`);
  }
  return { ref: body, end };
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9" && char.length === 1;
}
