import { describe, it, expect } from 'vitest';
import { lex } from '../../src/parser/lexer.js';
import { parse } from '../../src/parser/parser.js';
import type { RawNode } from '../../src/parser/types.js';
import { statementsOf } from '../helpers.js';

function only(text: string): RawNode {
  const statements = statementsOf(text);
  expect(statements).toHaveLength(1);
  return statements[0];
}

function types(nodes: RawNode[]): string[] {
  return nodes.map((n) => n.type);
}

function fieldTypes(node: RawNode, field: string): string[] {
  return node.children.filter((c) => c.field === field).map((c) => c.type);
}

describe('parser', () => {
  describe('simple commands', () => {
    it('parses a command with arguments', () => {
      const c = only('echo hello');
      expect(c.type).toBe('command');
      expect(types(c.children)).toEqual(['command_name', 'word']);
      expect(c.children.map((n) => n.field)).toEqual(['name', 'argument']);
      expect(c.startIndex).toBe(0);
      expect(c.endIndex).toBe(10);
      expect(c.missing).toEqual([]);
    });

    it('parses empty input', () => {
      expect(statementsOf('')).toEqual([]);
      expect(statementsOf('\n\n;\n')).toEqual([]);
    });

    it('types words by quoting', () => {
      const c = only('echo \'a\' "b" c"d"');
      expect(types(c.children)).toEqual(['command_name', 'raw_string', 'string', 'concatenation']);
    });

    it('parses a lone assignment', () => {
      const a = only('FOO=bar');
      expect(a.type).toBe('variable_assignment');
      expect(a.children.map((n) => [n.type, n.startIndex, n.endIndex])).toEqual([
        ['variable_name', 0, 3],
        ['word', 4, 7],
      ]);
    });

    it('keeps prefix assignments on the command', () => {
      const c = only('FOO=bar env');
      expect(c.type).toBe('command');
      expect(fieldTypes(c, 'assignment')).toEqual(['variable_assignment']);
      expect(fieldTypes(c, 'name')).toEqual(['command_name']);
    });

    it('parses declaration and unset commands', () => {
      expect(types(only('export A=1 B').children)).toEqual(['variable_assignment', 'word']);
      expect(only('export A=1 B').type).toBe('declaration_command');
      expect(only('unset A B').type).toBe('unset_command');
    });

    it('parses redirections', () => {
      const c = only('sort < in > out 2>&1');
      expect(fieldTypes(c, 'redirect')).toEqual(['file_redirect', 'file_redirect', 'file_redirect']);
      expect(only('cat <<< word').children[1].type).toBe('herestring_redirect');
    });

    it('parses a test command', () => {
      const t = only('[[ -f x ]]');
      expect(t.type).toBe('test_command');
      expect(t.children).toHaveLength(2);
      expect(t.endIndex).toBe(10);
    });
  });

  describe('pipelines and lists', () => {
    it('parses a pipeline', () => {
      const p = only('a | b | c');
      expect(p.type).toBe('pipeline');
      expect(types(p.children)).toEqual(['command', 'command', 'command']);
    });

    it('parses a negated command', () => {
      const n = only('! false');
      expect(n.type).toBe('negated_command');
      expect(types(n.children)).toEqual(['command']);
    });

    it('parses an and-or list', () => {
      const l = only('a && b || c');
      expect(l.type).toBe('list');
      expect(l.children).toHaveLength(3);
    });

    it('splits on ; & and newlines', () => {
      const statements = statementsOf('a; b & c\nd');
      expect(statements.map((s) => s.endIndex)).toEqual([1, 4, 8, 10]);
    });

    it('allows a newline after a pipe or &&', () => {
      expect(only('a |\nb').type).toBe('pipeline');
      expect(only('a &&\nb').type).toBe('list');
    });
  });

  describe('compound commands', () => {
    it('parses if with elif and else', () => {
      const s = only('if a; then b; elif c; then d; else e; fi');
      expect(s.type).toBe('if_statement');
      expect(s.children.map((c) => c.field)).toEqual(['condition', 'body', 'alternative', 'alternative']);
      expect(types(s.children.slice(2))).toEqual(['elif_clause', 'else_clause']);
      expect(s.missing).toEqual([]);
      expect(s.endIndex).toBe(40);
    });

    it('parses for loops', () => {
      const s = only('for i in 1 2 3; do echo $i; done');
      expect(s.type).toBe('for_statement');
      expect(types(s.children)).toEqual(['variable_name', 'word', 'word', 'word', 'do_group']);
      expect(s.children[4].field).toBe('body');
    });

    it('parses while and until loops', () => {
      expect(only('while true; do echo; done').type).toBe('while_statement');
      expect(only('until false\ndo\n  echo\ndone').type).toBe('until_statement');
    });

    it('parses case statements', () => {
      const s = only('case $x in\n  a|b) echo ab;;\n  (*) echo other;;\nesac');
      expect(s.type).toBe('case_statement');
      expect(types(s.children)).toEqual(['word', 'case_item', 'case_item']);
      expect(fieldTypes(s.children[1], 'pattern')).toEqual(['word', 'word']);
      expect(fieldTypes(s.children[2], 'body')).toEqual(['command']);
    });

    it('reads keywords in case patterns as words', () => {
      const s = only('case x in if) echo;; esac');
      expect(s.missing).toEqual([]);
      expect(fieldTypes(s.children[1], 'pattern')).toEqual(['word']);
    });

    it('parses function definitions in both forms', () => {
      const a = only('greet() { echo hi; }');
      expect(a.type).toBe('function_definition');
      expect(types(a.children)).toEqual(['word', 'compound_statement']);
      const b = only('function greet {\n  echo hi\n}');
      expect(b.type).toBe('function_definition');
      expect(b.children[1].type).toBe('compound_statement');
    });

    it('parses subshells and groups with redirections', () => {
      const sub = only('(cd /tmp && ls)');
      expect(sub.type).toBe('subshell');
      expect(types(sub.children)).toEqual(['list']);
      const group = only('{ echo a; } > out');
      expect(group.type).toBe('compound_statement');
      expect(fieldTypes(group, 'redirect')).toEqual(['file_redirect']);
    });

    it('treats reserved words after a compound command as closers of the outer one', () => {
      const s = only('if if a; then b; fi then c; fi');
      expect(s.type).toBe('if_statement');
      expect(s.missing).toEqual([]);
    });
  });

  describe('heredocs', () => {
    it('attaches the body and stretches the statement over it', () => {
      const c = only('cat <<EOF\nhello\nEOF\n');
      const redirect = c.children[1];
      expect(redirect.type).toBe('heredoc_redirect');
      expect(types(redirect.children)).toEqual(['word', 'heredoc_body']);
      expect(c.endIndex).toBe(19);
      expect(c.endPosition).toEqual({ row: 2, column: 3 });
    });

    it('attaches bodies to a statement that ended earlier on the line', () => {
      const statements = statementsOf('cat <<E; echo x\nbody\nE\n');
      expect(types(statements)).toEqual(['command', 'command']);
      expect(statements[0].endIndex).toBe(22);
      expect(statements[1].endPosition).toEqual({ row: 0, column: 15 });
    });

    it('records the terminator as missing when the body is open', () => {
      const redirect = only('cat <<EOF\ndata').children[1];
      expect(redirect.missing).toEqual(['EOF']);
    });

    it('records the terminator as missing before the body starts', () => {
      expect(only('cat <<EOF').children[1].missing).toEqual(['EOF']);
    });
  });

  describe('input that ends early', () => {
    it('keeps an open if with the missing closer', () => {
      const s = only('if true; then\n');
      expect(s.type).toBe('if_statement');
      expect(s.missing).toEqual(['fi']);
      expect(s.endIndex).toBe(13);
    });

    it('records then and fi when the condition is still open', () => {
      expect(only('if true').missing).toEqual(['then', 'fi']);
    });

    it('keeps nested loops open', () => {
      const outer = only('for i in 1; do for j in 2');
      expect(outer.type).toBe('for_statement');
      const group = outer.children[2];
      expect(group.type).toBe('do_group');
      expect(group.missing).toEqual(['done']);
      const inner = group.children[0];
      expect(inner.type).toBe('for_statement');
      expect(inner.missing).toEqual(['do', 'done']);
    });

    it('records a missing command after an operator', () => {
      const l = only('a &&');
      expect(l.type).toBe('list');
      expect(l.missing).toEqual(['command']);
      expect(only('a |').missing).toEqual(['command']);
    });

    it('records an unterminated word', () => {
      const c = only('echo "abc');
      expect(c.children[1].missing).toEqual(['word_end']);
    });

    it('reports a dangling line continuation', () => {
      const text = 'echo a \\\n';
      let id = 0;
      const output = parse(lex(text), text, { nextId: () => ++id });
      expect(output.danglingEscape).toBe(true);
      expect(output.statements).toHaveLength(1);
    });
  });

  describe('syntax errors', () => {
    it('wraps an if without a condition in an ERROR node', () => {
      const s = only('if then fi');
      expect(s.type).toBe('ERROR');
      expect([s.startIndex, s.endIndex]).toEqual([0, 10]);
    });

    it('rejects stray closers', () => {
      const statements = statementsOf('echo a; fi');
      expect(types(statements)).toEqual(['command', 'ERROR']);
      expect([statements[1].startIndex, statements[1].endIndex]).toEqual([8, 10]);
    });

    it('rejects misplaced operators', () => {
      expect(only('echo a )').type).toBe('ERROR');
      expect(only('| b').type).toBe('ERROR');
      expect(only(';; x').type).toBe('ERROR');
    });

    it('rejects an empty loop body', () => {
      expect(only('while true; do done').type).toBe('ERROR');
    });

    it('resumes on the next line', () => {
      const statements = statementsOf('fi\necho ok');
      expect(types(statements)).toEqual(['ERROR', 'command']);
      expect(statements[1].startPosition).toEqual({ row: 1, column: 0 });
    });
  });

  it('allocates ids from the callback', () => {
    const text = 'a; b';
    let id = 100;
    const { statements } = parse(lex(text), text, { nextId: () => ++id });
    const ids = statements.flatMap(function collect(n: RawNode): number[] {
      return [n.id, ...n.children.flatMap(collect)];
    });
    expect(new Set(ids).size).toBe(ids.length);
    expect(Math.min(...ids)).toBe(101);
  });
});
