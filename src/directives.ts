import { ConfigError, errorMessage } from "./errors";
import { parseDuration } from "./duration";

/**
 * Reader for the host's configuration block:
 *
 *   parspack {
 *     interval 2h
 *     timeout 30s
 *   }
 *
 * The block is optional. Each directive takes exactly one argument on its
 * own line; `#` starts a comment.
 */

type Token = { text: string; line: number };

export type DirectiveBlock = {
  name: string;
  interval?: number;
  timeout?: number;
};

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  input.split(/\r?\n/).forEach((raw, i) => {
    for (const word of raw.trim().split(/\s+/)) {
      if (!word) continue;
      if (word.startsWith("#")) break;
      tokens.push({ text: word, line: i + 1 });
    }
  });
  return tokens;
}

function fail(token: Token, message: string): never {
  throw new ConfigError(`line ${token.line}: ${message}`);
}

type DurationDirective = "interval" | "timeout";

function isDurationDirective(name: string): name is DurationDirective {
  return name === "interval" || name === "timeout";
}

export function parseDirectiveBlock(input: string): DirectiveBlock {
  const tokens = tokenize(input);
  const head = tokens[0];
  if (!head) throw new ConfigError("missing module name");
  if (head.text === "{" || head.text === "}") fail(head, `unexpected "${head.text}"`);

  const out: DirectiveBlock = { name: head.text };
  let i = 1;

  const open = tokens[i];
  if (!open) return out;
  if (open.text !== "{") {
    fail(open, `unexpected argument "${open.text}": ${head.text} takes no arguments`);
  }
  if (open.line !== head.line) {
    fail(open, `"{" must be on the same line as ${head.text}`);
  }
  i++;

  let closed = false;
  while (i < tokens.length) {
    const directive = tokens[i];
    if (directive.text === "}") {
      closed = true;
      i++;
      break;
    }
    if (directive.text === "{") fail(directive, `unexpected "{"`);
    i++;

    const args: Token[] = [];
    while (
      i < tokens.length &&
      tokens[i].line === directive.line &&
      tokens[i].text !== "}"
    ) {
      args.push(tokens[i]);
      i++;
    }

    if (!isDurationDirective(directive.text)) {
      fail(directive, `unrecognized directive "${directive.text}"`);
    }
    if (args.length !== 1) {
      fail(directive, `${directive.text} takes exactly one argument, got ${args.length}`);
    }
    let ms: number;
    try {
      ms = parseDuration(args[0].text);
    } catch (err) {
      fail(args[0], `invalid ${directive.text} duration: ${errorMessage(err)}`);
    }
    out[directive.text] = ms;
  }

  if (!closed) throw new ConfigError(`missing "}" for ${head.text} block`);
  const trailing = tokens[i];
  if (trailing) fail(trailing, `unexpected "${trailing.text}" after block`);
  return out;
}
