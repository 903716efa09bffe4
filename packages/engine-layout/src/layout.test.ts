import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { FormatResult, Settings } from '@reflow/core';
import { formatSource } from './layout.js';

const settings: Settings = {
    maxWidth: 100,
    tabSpaces: 4,
    indentationStyle: 'spaces',
    newlineStyle: 'unix',
};

function formatted(source: string, overrides: Partial<Settings> = {}): string {
    const result = formatSource(source, { ...settings, ...overrides });
    if (!result.ok) {
        assert.fail(`expected formatted text, got error: ${result.message}`);
    }
    return result.text;
}

function failure(source: string): FormatResult {
    return formatSource(source, settings);
}

describe('formatSource indentation', () => {
    it('indents by bracket depth and dedents leading closers', () => {
        const source = [
            'fn main() {',
            'let x = vec![1,',
            '2];',
            '       if x.len() > 0 {',
            'println!("{}", x[0]);',
            '}   ',
            '}',
        ].join('\n');
        assert.equal(formatted(source), [
            'fn main() {',
            '    let x = vec![1,',
            '        2];',
            '    if x.len() > 0 {',
            '        println!("{}", x[0]);',
            '    }',
            '}',
            '',
        ].join('\n'));
    });

    it('ignores brackets in strings, char literals and comments', () => {
        const source = [
            'fn f<\'a>() {',
            'let s = "}";',
            'let c = \'{\';',
            'let q = \'\\\'\';',
            '// } not code',
            '/* { */',
            'let l: &\'a str = x;',
            '}',
        ].join('\n');
        assert.equal(formatted(source), [
            'fn f<\'a>() {',
            '    let s = "}";',
            '    let c = \'{\';',
            '    let q = \'\\\'\';',
            '    // } not code',
            '    /* { */',
            '    let l: &\'a str = x;',
            '}',
            '',
        ].join('\n'));
    });

    it('keeps the continuation of a multi-line string verbatim', () => {
        const source = 'fn f() {\nlet s = "line one   \n  keep {this}\nend";\n}\n';
        assert.equal(formatted(source), 'fn f() {\n    let s = "line one   \n  keep {this}\nend";\n}\n');
    });

    it('keeps block comment continuation lines apart from trailing whitespace', () => {
        const source = 'fn f() {\n/* first\n      { second }   \n*/\n}\n';
        assert.equal(formatted(source), 'fn f() {\n    /* first\n      { second }\n*/\n}\n');
    });

    it('uses tabs when asked', () => {
        assert.equal(formatted('fn f() {\nx();\n}\n', { indentationStyle: 'tabs' }), 'fn f() {\n\tx();\n}\n');
    });

    it('follows the first indented line in auto mode', () => {
        assert.equal(formatted('fn f() {\n\t\t  x();\n}\n', { indentationStyle: 'auto' }), 'fn f() {\n\tx();\n}\n');
        assert.equal(formatted('fn f() {\n  x();\n}\n', { indentationStyle: 'auto' }), 'fn f() {\n    x();\n}\n');
    });

    it('ignores later lines when they outnumber the first indented one', () => {
        const source = 'fn f() {\n  a();\n\tb();\n\tc();\n}\n';
        const once = formatted(source, { indentationStyle: 'auto' });
        assert.equal(once, 'fn f() {\n    a();\n    b();\n    c();\n}\n');
        assert.equal(formatted(once, { indentationStyle: 'auto' }), once);
    });

    it('honours tabSpaces', () => {
        assert.equal(formatted('fn f() {\nx();\n}\n', { tabSpaces: 2 }), 'fn f() {\n  x();\n}\n');
    });
});

describe('formatSource whitespace', () => {
    it('drops trailing blank lines and ends with one newline', () => {
        assert.equal(formatted('x();\n\n\n'), 'x();\n');
        assert.equal(formatted('x();'), 'x();\n');
    });

    it('keeps interior blank lines but empties them', () => {
        assert.equal(formatted('a();\n   \nb();\n'), 'a();\n\nb();\n');
    });

    it('returns an empty file unchanged', () => {
        assert.equal(formatted(''), '');
        assert.equal(formatted('   \n\t\n'), '');
    });

    it('converts line endings', () => {
        assert.equal(formatted('a();\nb();\n', { newlineStyle: 'windows' }), 'a();\r\nb();\r\n');
        assert.equal(formatted('a();\r\nb();\r\n', { newlineStyle: 'unix' }), 'a();\nb();\n');
    });

    it('keeps the first line ending in auto mode', () => {
        assert.equal(formatted('a();\r\nb();\n', { newlineStyle: 'auto' }), 'a();\r\nb();\r\n');
        assert.equal(formatted('a();\nb();\r\n', { newlineStyle: 'auto' }), 'a();\nb();\n');
    });
});

describe('formatSource comment wrapping', () => {
    it('wraps long line comments at word boundaries', () => {
        const source = 'fn f() {\n// alpha beta gamma delta epsilon\n}\n';
        assert.equal(
            formatted(source, { maxWidth: 20 }),
            'fn f() {\n    // alpha beta\n    // gamma delta\n    // epsilon\n}\n'
        );
    });

    it('keeps the doc comment marker on every wrapped line', () => {
        assert.equal(formatted('/// one two three\n', { maxWidth: 12 }), '/// one two\n/// three\n');
    });

    it('leaves a single over-long word alone', () => {
        const source = '// abcdefghijklmnopqrstuvwxyz\n';
        assert.equal(formatted(source, { maxWidth: 10 }), source);
    });

    it('does not wrap code lines', () => {
        const source = 'let value = compute(first_argument, second_argument);\n';
        assert.equal(formatted(source, { maxWidth: 20 }), source);
    });
});

describe('formatSource errors', () => {
    it('reports an unmatched closer', () => {
        assert.deepStrictEqual(failure('fn main() {\n    let x = 1;\n}}\n'), {
            ok: false,
            message: 'unexpected token `}` at line 3',
        });
    });

    it('reports a mismatched closer', () => {
        assert.deepStrictEqual(failure('fn main() {\n    foo(1];\n}\n'), {
            ok: false,
            message: 'unexpected token `]` at line 2',
        });
    });

    it('reports the innermost unclosed delimiter', () => {
        assert.deepStrictEqual(failure('fn main() {\n    if x {\n'), {
            ok: false,
            message: 'unclosed delimiter `{` opened at line 2',
        });
    });

    it('reports an unterminated string', () => {
        assert.deepStrictEqual(failure('let s = "abc;\n'), { ok: false, message: 'unterminated string literal' });
    });

    it('reports an unterminated block comment', () => {
        assert.deepStrictEqual(failure('/* start\n'), { ok: false, message: 'unterminated block comment' });
    });
});

describe('formatSource idempotence', () => {
    const samples = [
        'fn main() {\n\t  let v = [\n1,\n    2,\n  ];\n// a comment that is long enough to be wrapped at forty\n  match v { _ => {} }\n}\n\n',
        'impl<\'a> S<\'a> {\n  fn g(&self) -> &\'a str {\n        "multi\n    line {"\n    }\n}',
        '/// doc\r\nstruct S {\r\n   a: u8,   \r\n}\r\n',
    ];

    for (const [index, sample] of samples.entries()) {
        for (const style of ['auto', 'spaces', 'tabs'] as const) {
            it(`is a no-op on its own output (sample ${index + 1}, ${style})`, () => {
                const overrides: Partial<Settings> = { maxWidth: 40, indentationStyle: style, newlineStyle: 'auto' };
                const once = formatted(sample, overrides);
                assert.equal(formatted(once, overrides), once);
            });
        }
    }
});
