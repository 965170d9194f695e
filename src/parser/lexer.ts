import { TokenKind, type Token, type WordPart } from './types.js';

interface PendingHeredoc {
  delimiter: string;
  stripIndent: boolean;
}

/**
 * Tokenize `input`, starting at offset `start`. The lexer never fails: text
 * it cannot close before end of input comes back as tokens flagged
 * `unterminated`, and a trailing backslash continuation marks the EOF token.
 */
export function lex(input: string, start = 0): Token[] {
  return new Lexer(input, start).run();
}

class Lexer {
  private tokens: Token[] = [];
  private i: number;
  private pendingHeredocs: PendingHeredoc[] = [];
  private expectDelimiter: { stripIndent: boolean } | null = null;
  private danglingEscape = false;

  constructor(private input: string, start: number) {
    this.i = start;
  }

  run(): Token[] {
    const input = this.input;

    while (this.i < input.length) {
      const ch = input[this.i];

      // Skip whitespace (but NOT newlines -- they become Newline tokens)
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.i++;
        continue;
      }

      // Backslash-newline joins lines
      if (ch === '\\' && (input[this.i + 1] === '\n' || this.i + 1 >= input.length)) {
        this.noteEscapeAtEnd(this.i);
        this.i = Math.min(this.i + 2, input.length);
        continue;
      }

      if (ch === '\n') {
        this.tokens.push({ kind: TokenKind.Newline, value: '\n', pos: this.i, end: this.i + 1 });
        this.i++;
        this.expectDelimiter = null;
        if (this.pendingHeredocs.length > 0) {
          this.readHeredocBodies();
        }
        continue;
      }

      // Comment -- skip to end of line
      if (ch === '#') {
        while (this.i < input.length && input[this.i] !== '\n') {
          this.i++;
        }
        continue;
      }

      const op = tryOperator(input, this.i);
      if (op) {
        this.tokens.push(op);
        this.i = op.end;
        if (op.kind === TokenKind.HeredocStart) {
          this.expectDelimiter = { stripIndent: op.stripIndent === true };
        } else {
          this.expectDelimiter = null;
        }
        continue;
      }

      const word = this.readWord();
      if (word) {
        this.tokens.push(word);
        if (this.expectDelimiter) {
          this.pendingHeredocs.push({
            delimiter: word.value,
            stripIndent: this.expectDelimiter.stripIndent,
          });
          this.expectDelimiter = null;
        }
        continue;
      }

      // Shouldn't reach here, but advance to avoid infinite loop
      this.i++;
    }

    const eof: Token = { kind: TokenKind.EOF, value: '', pos: input.length, end: input.length };
    if (this.danglingEscape) eof.unterminated = true;
    this.tokens.push(eof);
    return this.tokens;
  }

  /** A backslash at `pos` that escapes a final newline (or nothing at all). */
  private noteEscapeAtEnd(pos: number): void {
    const len = this.input.length;
    if (pos + 1 >= len || (this.input[pos + 1] === '\n' && pos + 2 >= len)) {
      this.danglingEscape = true;
    }
  }

  private readHeredocBodies(): void {
    const input = this.input;

    while (this.pendingHeredocs.length > 0) {
      const heredoc = this.pendingHeredocs.shift();
      if (!heredoc) break;
      const bodyStart = this.i;

      for (;;) {
        const lineEnd = input.indexOf('\n', this.i);
        const line = input.slice(this.i, lineEnd === -1 ? input.length : lineEnd);
        const candidate = heredoc.stripIndent ? line.replace(/^[ \t]+/, '') : line;

        if (candidate === heredoc.delimiter) {
          const end = lineEnd === -1 ? input.length : lineEnd;
          this.tokens.push({
            kind: TokenKind.HeredocBody,
            value: input.slice(bodyStart, this.i),
            pos: bodyStart,
            end,
          });
          this.i = lineEnd === -1 ? input.length : lineEnd + 1;
          break;
        }

        if (lineEnd === -1) {
          this.tokens.push({
            kind: TokenKind.HeredocBody,
            value: input.slice(bodyStart),
            pos: bodyStart,
            end: input.length,
            unterminated: true,
          });
          this.i = input.length;
          this.pendingHeredocs = [];
          return;
        }

        this.i = lineEnd + 1;
      }
    }
  }

  private readWord(): Token | null {
    const input = this.input;
    const pos = this.i;
    const parts: WordPart[] = [];
    let i = pos;
    let currentText = '';
    let hasContent = false;
    let unterminated = false;

    const flush = () => {
      if (currentText) {
        parts.push({ text: currentText, quoted: 'none' });
        currentText = '';
      }
    };

    while (i < input.length) {
      const ch = input[i];

      // Backslash escape (outside quotes)
      if (ch === '\\') {
        if (i + 1 >= input.length || input[i + 1] === '\n') {
          this.noteEscapeAtEnd(i);
          i = Math.min(i + 2, input.length);
          continue;
        }
        currentText += input[i + 1];
        i += 2;
        hasContent = true;
        continue;
      }

      // Single quote
      if (ch === "'") {
        flush();
        i++; // skip opening quote
        const start = i;
        while (i < input.length && input[i] !== "'") {
          i++;
        }
        parts.push({ text: input.slice(start, i), quoted: 'single' });
        if (i < input.length) i++; // skip closing quote
        else unterminated = true;
        hasContent = true;
        continue;
      }

      // Double quote
      if (ch === '"') {
        flush();
        i++; // skip opening quote
        let dqText = '';
        while (i < input.length && input[i] !== '"') {
          if (input[i] === '\\' && i + 1 < input.length) {
            const nextCh = input[i + 1];
            // Inside double quotes, only these chars are special with backslash
            if (nextCh === '"' || nextCh === '\\' || nextCh === '$' || nextCh === '`') {
              dqText += nextCh;
              i += 2;
            } else if (nextCh === '\n') {
              this.noteEscapeAtEnd(i);
              i += 2;
            } else {
              dqText += '\\';
              i++;
            }
          } else if (input[i] === '$' && input[i + 1] === '(') {
            const subst = readCommandSubstitution(input, i);
            dqText += subst.text;
            i = subst.end;
            if (subst.unterminated) unterminated = true;
          } else if (input[i] === '`') {
            const subst = readBackquoted(input, i);
            dqText += subst.text;
            i = subst.end;
            if (subst.unterminated) unterminated = true;
          } else {
            dqText += input[i];
            i++;
          }
        }
        parts.push({ text: dqText, quoted: 'double' });
        if (i < input.length) i++; // skip closing quote
        else unterminated = true;
        hasContent = true;
        continue;
      }

      // $(...) or $((...)) command/arithmetic substitution
      if (ch === '$' && input[i + 1] === '(') {
        const subst = readCommandSubstitution(input, i);
        currentText += subst.text;
        i = subst.end;
        if (subst.unterminated) unterminated = true;
        hasContent = true;
        continue;
      }

      // `...` legacy command substitution
      if (ch === '`') {
        const subst = readBackquoted(input, i);
        currentText += subst.text;
        i = subst.end;
        if (subst.unterminated) unterminated = true;
        hasContent = true;
        continue;
      }

      // ${...} braced variable expansion -- read until matching }
      if (ch === '$' && input[i + 1] === '{') {
        currentText += '${';
        let j = i + 2;
        let depth = 1;
        while (j < input.length && depth > 0) {
          if (input[j] === '{') depth++;
          else if (input[j] === '}') depth--;
          if (depth > 0) {
            currentText += input[j];
          }
          j++;
        }
        if (depth > 0) unterminated = true;
        else currentText += '}';
        i = j;
        hasContent = true;
        continue;
      }

      // name=( ... ) array assignment keeps the parenthesised list in the word
      if (ch === '(' && /^[a-zA-Z_][a-zA-Z0-9_]*\+?=$/.test(currentText) && parts.length === 0) {
        let j = i + 1;
        let depth = 1;
        while (j < input.length && depth > 0) {
          if (input[j] === '(') depth++;
          else if (input[j] === ')') depth--;
          j++;
        }
        if (depth > 0) unterminated = true;
        currentText += input.slice(i, j);
        i = j;
        hasContent = true;
        continue;
      }

      if (isWordBreak(ch)) {
        break;
      }

      currentText += ch;
      i++;
      hasContent = true;
    }

    if (!hasContent) return null;

    flush();

    this.i = i;
    const token: Token = {
      kind: TokenKind.Word,
      value: parts.map((p) => p.text).join(''),
      pos,
      end: i,
      parts,
    };
    if (unterminated) token.unterminated = true;
    return token;
  }
}

function op(kind: TokenKind, value: string, pos: number): Token {
  return { kind, value, pos, end: pos + value.length };
}

function tryOperator(input: string, pos: number): Token | null {
  const ch = input[pos];
  const next = input[pos + 1];
  const third = input[pos + 2];

  if (ch === '&') {
    if (next === '>' && third === '>') return op(TokenKind.RedirectAllAppend, '&>>', pos);
    if (next === '>') return op(TokenKind.RedirectAll, '&>', pos);
    if (next === '&') return op(TokenKind.And, '&&', pos);
    return op(TokenKind.Amp, '&', pos);
  }

  if (ch === '|') {
    if (next === '|') return op(TokenKind.Or, '||', pos);
    return op(TokenKind.Pipe, '|', pos);
  }

  // 2>, 2>>, 2>& -- only when the 2 starts a word
  if (ch === '2' && next === '>' && (pos === 0 || isOperatorBreak(input[pos - 1]))) {
    if (third === '&') return op(TokenKind.RedirectErrDup, '2>&', pos);
    if (third === '>') return op(TokenKind.RedirectErrAppend, '2>>', pos);
    return op(TokenKind.RedirectErr, '2>', pos);
  }

  if (ch === '>') {
    if (next === '&') return op(TokenKind.RedirectDup, '>&', pos);
    if (next === '>') return op(TokenKind.RedirectAppend, '>>', pos);
    return op(TokenKind.RedirectOut, '>', pos);
  }

  if (ch === '<') {
    if (next === '<' && third === '<') return op(TokenKind.HereString, '<<<', pos);
    if (next === '<' && third === '-') {
      return { ...op(TokenKind.HeredocStart, '<<-', pos), stripIndent: true };
    }
    if (next === '<') return op(TokenKind.HeredocStart, '<<', pos);
    return op(TokenKind.RedirectIn, '<', pos);
  }

  if (ch === ';') {
    if (next === ';') return op(TokenKind.DoubleSemi, ';;', pos);
    return op(TokenKind.Semi, ';', pos);
  }

  if (ch === '(') return op(TokenKind.LParen, '(', pos);
  if (ch === ')') return op(TokenKind.RParen, ')', pos);

  return null;
}

function isOperatorBreak(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '|' || ch === '&' || ch === ';'
    || ch === '>' || ch === '<' || ch === '\n' || ch === '(' || ch === ')';
}

function isWordBreak(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '|' || ch === '&' || ch === ';'
    || ch === '>' || ch === '<' || ch === '\n' || ch === '(' || ch === ')';
}

interface ScanResult {
  text: string;
  end: number;
  unterminated: boolean;
}

function readCommandSubstitution(input: string, pos: number): ScanResult {
  // pos points at '$', input[pos + 1] is '('
  let i = pos + 1;

  // $(( -- arithmetic expansion, read until matching ))
  if (input[i + 1] === '(') {
    let j = i + 2;
    let depth = 1;
    while (j < input.length) {
      if (input[j] === '(' && input[j + 1] === '(') {
        depth++;
        j += 2;
      } else if (input[j] === ')' && input[j + 1] === ')') {
        depth--;
        j += 2;
        if (depth === 0) break;
      } else {
        j++;
      }
    }
    return { text: input.slice(pos, j), end: j, unterminated: depth > 0 };
  }

  // Regular $(...) command substitution; quotes inside may hold parens
  i++; // skip (
  let depth = 1;
  while (i < input.length && depth > 0) {
    const ch = input[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const close = input.indexOf(ch, i + 1);
      if (close === -1) {
        i = input.length;
        break;
      }
      i = close + 1;
      continue;
    }
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    i++;
  }

  const end = Math.min(i, input.length);
  return { text: input.slice(pos, end), end, unterminated: depth > 0 };
}

function readBackquoted(input: string, pos: number): ScanResult {
  let i = pos + 1;
  while (i < input.length && input[i] !== '`') {
    i += input[i] === '\\' ? 2 : 1;
  }
  if (i >= input.length) {
    return { text: input.slice(pos), end: input.length, unterminated: true };
  }
  return { text: input.slice(pos, i + 1), end: i + 1, unterminated: false };
}
