import { describe, it, expect } from 'vitest';
import { IncrementalParser } from '../../src/parser/IncrementalParser.js';
import { toSyntaxTree } from '../../src/parser/convert.js';
import { shapeOf } from '../helpers.js';

describe('IncrementalParser', () => {
  it('parses from scratch without a previous tree', () => {
    const result = new IncrementalParser().parse('echo a\n', null);
    expect(result.tree.text).toBe('echo a\n');
    expect(result.tree.root.type).toBe('program');
    expect(result.tree.root.children.map((c) => c.type)).toEqual(['command']);
    expect(result.hasError).toBe(false);
    expect(result.changedRanges).toEqual([
      { startIndex: 0, endIndex: 7, start: { row: 0, column: 0 }, end: { row: 1, column: 0 } },
    ]);
  });

  it('reuses finished statements when the text is extended', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('echo a\necho b\n', null);
    const second = engine.parse('echo a\necho b\necho c\n', first.tree);

    const [a, b, c] = second.tree.root.children;
    expect(a).toBe(first.tree.root.children[0]);
    expect(b.id).not.toBe(first.tree.root.children[1].id);
    expect(c.startPosition).toEqual({ row: 2, column: 0 });
    expect(second.changedRanges).toEqual([
      { startIndex: 7, endIndex: 21, start: { row: 1, column: 0 }, end: { row: 3, column: 0 } },
    ]);
  });

  it('finishes an open statement after reused ones', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('echo a\nif true; then\n', null);
    expect(first.hasError).toBe(true);

    const second = engine.parse('echo a\nif true; then\necho b\nfi\n', first.tree);
    expect(second.hasError).toBe(false);
    expect(second.tree.root.children.map((c) => c.type)).toEqual(['command', 'if_statement']);
    expect(second.tree.root.children[0]).toBe(first.tree.root.children[0]);
    expect(second.changedRanges[0].startIndex).toBe(7);
  });

  it('does not reuse anything after a syntax error', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('fi\necho a\n', null);
    const second = engine.parse('fi\necho a\necho b\n', first.tree);
    expect(second.tree.root.children[0]).not.toBe(first.tree.root.children[0]);
    expect(second.changedRanges[0].startIndex).toBe(0);
  });

  it('does not reuse anything when the text was rewritten', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('echo a\necho b\n', null);
    const second = engine.parse('echo x\necho b\necho c\n', first.tree);
    expect(second.changedRanges[0].startIndex).toBe(0);
    expect(second.tree.root.children[0].id).not.toBe(first.tree.root.children[0].id);
  });

  it('does not reuse a statement still waiting for its heredoc body', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('cat <<E; echo x', null);
    expect(first.hasError).toBe(true);

    const second = engine.parse('cat <<E; echo x\nbody\nE\n', first.tree);
    expect(second.hasError).toBe(false);
    const redirect = second.tree.root.children[0].children[1];
    expect(redirect.children.map((c) => c.type)).toEqual(['word', 'heredoc_body']);
    expect(second.changedRanges[0].startIndex).toBe(0);
  });

  it('does not reuse a heredoc statement that overlaps the next one', () => {
    const text = 'cat <<E; echo x\ndone\nE\n';
    const engine = new IncrementalParser();
    const first = engine.parse(text, null);
    const second = engine.parse(text + 'echo y\n', first.tree);

    expect(second.hasError).toBe(false);
    expect(second.changedRanges[0].startIndex).toBe(0);
    expect(second.tree.root.children.map((c) => c.startIndex)).toEqual([0, 9, 23]);

    const whole = new IncrementalParser().parse(text + 'echo y\n', null);
    expect(shapeOf(toSyntaxTree(second.tree))).toEqual(shapeOf(toSyntaxTree(whole.tree)));
  });

  it('reuses a heredoc statement whose body ends before the next statement', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('cat <<E\nbody\nE\necho a\n', null);
    const second = engine.parse('cat <<E\nbody\nE\necho a\necho b\n', first.tree);

    expect(second.tree.root.children[0]).toBe(first.tree.root.children[0]);
    expect(second.changedRanges[0].startIndex).toBe(15);
  });

  it('flags unfinished input', () => {
    const engine = new IncrementalParser();
    expect(engine.parse('if true; then\n', null).hasError).toBe(true);
    expect(engine.parse('echo "abc', null).hasError).toBe(true);

    const continued = engine.parse('echo a \\', null);
    expect(continued.hasError).toBe(true);
    expect(continued.tree.root.missing).toEqual(['line_continuation']);
  });

  it('never hands out the same id twice', () => {
    const engine = new IncrementalParser();
    const first = engine.parse('a\n', null);
    const second = engine.parse('b\n', null);
    expect(second.tree.root.id).not.toBe(first.tree.root.id);
    expect(second.tree.root.children[0].id).toBeGreaterThan(first.tree.root.id);
  });
});
