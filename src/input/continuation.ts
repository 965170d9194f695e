import { COMPOUND_CLOSERS, type CloserType, type OpenerType } from '../parser/types.js';

export type ContinuationState =
  | { kind: 'complete' }
  | { kind: 'line_continuation' }
  | { kind: 'quote_continuation'; quote: 'single' | 'double' }
  | { kind: 'heredoc_continuation'; delimiter: string; stripIndent: boolean }
  | { kind: 'structure_continuation'; openers: OpenerType[]; expecting: CloserType };

/**
 * Decide from the text alone whether buffered input can be handed to the
 * parser or is still waiting for more. Safe to call on every keystroke: it
 * is a single pass with no state outside the call.
 *
 * When several things are open at once the report follows a fixed order:
 * a trailing backslash, then an open quote, then a heredoc, then the
 * innermost unclosed compound command.
 */
export function detectContinuation(text: string): ContinuationState {
  return new ContinuationScanner(text).run();
}

export function readyToParse(text: string): boolean {
  return detectContinuation(text).kind === 'complete';
}

// ─── Scanner ───

type Quote = 'none' | 'single' | 'double';

type CharClass = 'space' | 'newline' | 'operator' | 'quote' | 'escape' | 'comment' | 'word';

interface HeredocMarker {
  delimiter: string;
  stripIndent: boolean;
}

type CasePhase = 'subject' | 'pattern' | 'body';

interface StructureFrame {
  type: 'structure';
  opener: OpenerType;
  /** `case` only: where in the statement the scan currently is. */
  phase?: CasePhase;
  subjectSeen?: boolean;
  patternStart?: boolean;
}

type Frame =
  | StructureFrame
  | { type: 'group' }
  | { type: 'subst'; quote: Quote; commandStart: boolean; word: string };

const OPENERS: readonly OpenerType[] = ['if', 'for', 'while', 'until', 'case'];

function isOpener(word: string): word is OpenerType {
  return OPENERS.some((opener) => opener === word);
}

/** Reserved words after which the next word is again in command position. */
const COMMAND_PREFIXES = new Set(['then', 'else', 'elif', 'do', '{', '!']);

const ASSIGNMENT_RE = /^[a-zA-Z_][a-zA-Z0-9_]*(\[[^\]]*\])?\+?=/;

function charClass(ch: string, inWord: boolean): CharClass {
  switch (ch) {
    case ' ':
    case '\t':
    case '\r':
      return 'space';
    case '\n':
      return 'newline';
    case ';':
    case '&':
    case '|':
    case '<':
    case '>':
    case '(':
    case ')':
      return 'operator';
    case "'":
    case '"':
      return 'quote';
    case '\\':
      return 'escape';
    case '#':
      return inWord ? 'word' : 'comment';
    default:
      return 'word';
  }
}

class ContinuationScanner {
  private i = 0;
  private readonly trimmedEnd: number;

  private quote: Quote = 'none';
  private frames: Frame[] = [];
  private commandStart = true;
  private redirectTarget = false;
  /** After `function`: the next word is the name, then a body may open. */
  private functionName = false;

  private inWord = false;
  private plain = true;
  private word = '';

  private expectDelimiter: { stripIndent: boolean } | null = null;
  private pendingHeredocs: HeredocMarker[] = [];
  private danglingEscape = false;

  constructor(private text: string) {
    this.trimmedEnd = text.endsWith('\n') ? text.length - 1 : text.length;
  }

  run(): ContinuationState {
    const text = this.text;

    while (this.i < text.length) {
      const ch = text[this.i];

      if (this.quote === 'single') {
        if (ch === "'") this.quote = 'none';
        else this.word += ch;
        this.i++;
        continue;
      }

      if (this.quote === 'double') {
        this.scanDoubleQuoted(ch);
        continue;
      }

      switch (charClass(ch, this.inWord)) {
        case 'escape':
          this.scanEscape();
          break;
        case 'quote':
          this.startWord();
          this.plain = false;
          this.quote = ch === "'" ? 'single' : 'double';
          this.i++;
          break;
        case 'comment':
          while (this.i < text.length && text[this.i] !== '\n') this.i++;
          break;
        case 'space':
          this.endWord();
          this.i++;
          break;
        case 'newline':
          this.endWord();
          this.i++;
          this.onNewline();
          break;
        case 'operator':
          this.endWord();
          this.scanOperator();
          break;
        case 'word':
          if (ch === '$' && text[this.i + 1] === '(') {
            this.startWord();
            this.plain = false;
            this.openSubstitution();
            break;
          }
          this.startWord();
          this.word += ch;
          this.i++;
          break;
      }
    }

    this.endWord();
    return this.result();
  }

  private result(): ContinuationState {
    if (this.danglingEscape) {
      return { kind: 'line_continuation' };
    }

    if (this.quote !== 'none') {
      return { kind: 'quote_continuation', quote: this.quote };
    }
    if (this.frames.some((f) => f.type === 'subst' && f.quote === 'double')) {
      return { kind: 'quote_continuation', quote: 'double' };
    }

    const heredoc = this.pendingHeredocs[0];
    if (heredoc) {
      return { kind: 'heredoc_continuation', delimiter: heredoc.delimiter, stripIndent: heredoc.stripIndent };
    }

    const openers: OpenerType[] = [];
    for (const frame of this.frames) {
      if (frame.type === 'structure') openers.push(frame.opener);
    }
    const innermost = openers[openers.length - 1];
    if (innermost) {
      return { kind: 'structure_continuation', openers, expecting: COMPOUND_CLOSERS[innermost] };
    }

    return { kind: 'complete' };
  }

  // ─── Characters ───

  private scanDoubleQuoted(ch: string): void {
    if (ch === '\\') {
      this.noteEscape();
      this.word += this.text[this.i + 1] ?? '';
      this.i += 2;
      return;
    }
    if (ch === '"') {
      this.quote = 'none';
      this.i++;
      return;
    }
    if (ch === '$' && this.text[this.i + 1] === '(') {
      this.openSubstitution();
      return;
    }
    this.word += ch;
    this.i++;
  }

  private scanEscape(): void {
    this.noteEscape();
    const next = this.text[this.i + 1];
    if (next !== '\n') {
      // backslash-newline only joins lines; anything else is a quoted character
      this.startWord();
      this.plain = false;
      this.word += next ?? '';
    }
    this.i += 2;
  }

  private noteEscape(): void {
    if (this.i + 1 >= this.trimmedEnd) {
      this.danglingEscape = true;
    }
  }

  private onNewline(): void {
    if (!this.caseFrame('pattern')) {
      this.commandStart = true;
    }
    this.redirectTarget = false;
    this.expectDelimiter = null;
    if (this.pendingHeredocs.length > 0) {
      this.skipHeredocBodies();
    }
  }

  /** Consume heredoc bodies line by line; anything left pending stays open. */
  private skipHeredocBodies(): void {
    const text = this.text;

    while (this.pendingHeredocs.length > 0) {
      const heredoc = this.pendingHeredocs[0];
      let closed = false;

      while (this.i < text.length) {
        const lineEnd = text.indexOf('\n', this.i);
        const line = text.slice(this.i, lineEnd === -1 ? text.length : lineEnd);
        this.i = lineEnd === -1 ? text.length : lineEnd + 1;

        const candidate = heredoc.stripIndent ? line.replace(/^[ \t]+/, '') : line;
        if (candidate === heredoc.delimiter) {
          closed = true;
          break;
        }
      }

      if (!closed) return;
      this.pendingHeredocs.shift();
    }
  }

  private scanOperator(): void {
    const text = this.text;
    const at = (n: number) => text[this.i + n] ?? '';
    const ch = at(0);
    const patterns = this.caseFrame('pattern');
    const body = this.caseFrame('body');

    if (ch === ';') {
      if (at(1) === ';' || at(1) === '&') {
        const width = at(1) === ';' && at(2) === '&' ? 3 : 2;
        this.i += width;
        if (body) {
          body.phase = 'pattern';
          body.patternStart = true;
          this.commandStart = false;
        } else {
          this.commandStart = true;
        }
        return;
      }
      this.i++;
      this.commandStart = true;
      return;
    }

    if (ch === '&') {
      if (at(1) === '>') {
        this.i += at(2) === '>' ? 3 : 2;
        this.redirectTarget = true;
        return;
      }
      this.i += at(1) === '&' ? 2 : 1;
      this.commandStart = true;
      return;
    }

    if (ch === '|') {
      this.i += at(1) === '|' || at(1) === '&' ? 2 : 1;
      if (patterns) {
        patterns.patternStart = false;
      } else {
        this.commandStart = true;
      }
      return;
    }

    if (ch === '<') {
      if (at(1) === '<' && at(2) === '<') {
        this.i += 3;
        this.redirectTarget = true;
        return;
      }
      if (at(1) === '<') {
        const stripIndent = at(2) === '-';
        this.i += stripIndent ? 3 : 2;
        this.expectDelimiter = { stripIndent };
        return;
      }
      this.i += at(1) === '&' || at(1) === '>' ? 2 : 1;
      this.redirectTarget = true;
      return;
    }

    if (ch === '>') {
      this.i += at(1) === '>' || at(1) === '&' || at(1) === '|' ? 2 : 1;
      this.redirectTarget = true;
      return;
    }

    if (ch === '(') {
      if (!patterns) {
        // `name ( )` is a function header; its body starts in command position
        let j = this.i + 1;
        while (text[j] === ' ' || text[j] === '\t') j++;
        if (text[j] === ')') {
          this.i = j + 1;
          this.commandStart = true;
          return;
        }
      }
      this.i++;
      if (!patterns) {
        this.frames.push({ type: 'group' });
        this.commandStart = true;
      }
      return;
    }

    // ')'
    this.i++;
    if (patterns) {
      patterns.phase = 'body';
      this.commandStart = true;
      return;
    }
    this.closeGroup();
  }

  // ─── Words ───

  private startWord(): void {
    if (!this.inWord) {
      this.inWord = true;
      this.plain = true;
      this.word = '';
    }
  }

  private endWord(): void {
    if (!this.inWord) return;
    this.inWord = false;
    const word = this.word;
    const plain = this.plain;

    if (this.expectDelimiter) {
      this.pendingHeredocs.push({ delimiter: word, stripIndent: this.expectDelimiter.stripIndent });
      this.expectDelimiter = null;
      return;
    }

    if (this.redirectTarget) {
      this.redirectTarget = false;
      return;
    }

    const subject = this.caseFrame('subject');
    if (subject) {
      if (plain && word === 'in' && subject.subjectSeen) {
        subject.phase = 'pattern';
        subject.patternStart = true;
      } else {
        subject.subjectSeen = true;
      }
      return;
    }

    const patterns = this.caseFrame('pattern');
    if (patterns) {
      if (plain && word === 'esac' && patterns.patternStart) {
        this.frames.pop();
        this.commandStart = false;
        return;
      }
      patterns.patternStart = false;
      return;
    }

    if (this.functionName) {
      this.functionName = false;
      this.commandStart = true;
      return;
    }

    if (!this.commandStart) return;

    if (!plain) {
      this.commandStart = ASSIGNMENT_RE.test(word);
      return;
    }

    this.onCommandWord(word);
  }

  /** A plain word in command position: reserved words drive the opener stack. */
  private onCommandWord(word: string): void {
    if (isOpener(word)) {
      const opener = word;
      if (opener === 'case') {
        this.frames.push({ type: 'structure', opener, phase: 'subject', subjectSeen: false });
        this.commandStart = false;
      } else {
        this.frames.push({ type: 'structure', opener });
        this.commandStart = opener !== 'for';
      }
      return;
    }

    if (word === 'fi' || word === 'done' || word === 'esac') {
      this.closeStructure(word);
      this.commandStart = false;
      return;
    }

    if (COMMAND_PREFIXES.has(word)) {
      return;
    }

    if (word === 'function') {
      this.functionName = true;
      this.commandStart = false;
      return;
    }

    this.commandStart = ASSIGNMENT_RE.test(word);
  }

  private closeStructure(closer: CloserType): void {
    const top = this.top();
    if (top?.type === 'structure' && COMPOUND_CLOSERS[top.opener] === closer) {
      this.frames.pop();
    }
  }

  // ─── Substitutions and groups ───

  private openSubstitution(): void {
    this.frames.push({ type: 'subst', quote: this.quote, commandStart: this.commandStart, word: this.word });
    this.quote = 'none';
    this.inWord = false;
    this.commandStart = true;
    this.i += 2;
  }

  private closeGroup(): void {
    const top = this.top();
    if (top?.type === 'group') {
      this.frames.pop();
      this.commandStart = false;
      return;
    }
    if (top?.type === 'subst') {
      this.frames.pop();
      this.quote = top.quote;
      this.commandStart = top.commandStart;
      this.inWord = true;
      this.plain = false;
      this.word = top.word;
    }
  }

  /** The innermost frame, when it is a `case` statement in the given phase. */
  private caseFrame(phase: CasePhase): StructureFrame | null {
    const top = this.top();
    return top?.type === 'structure' && top.phase === phase ? top : null;
  }

  private top(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }
}
