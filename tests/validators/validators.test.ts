import { describe, it, expect } from 'vitest';
import {
    CodeValidatorRegistry,
    createDefaultValidatorRegistry,
    JsonValidator,
    JsoncValidator,
    stripJsonComments,
    YamlValidator,
    XmlValidator,
    CSharpValidator,
} from '../../src/validators/index.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('Code validators', () => {
    describe('JsonValidator', () => {
        const validator = new JsonValidator();

        it('should accept valid JSON', () => {
            expect(validator.validate('{"a": [1, 2], "b": null}')).toEqual({ valid: true });
        });

        it('should reject trailing commas and report the line', () => {
            const result = validator.validate('{\n  "a": 1,\n}');

            expect(result.valid).toBe(false);
            if (!result.valid) {
                expect(result.line).toBe(3);
            }
        });

        it('should reject comments', () => {
            expect(validator.validate('{ // note\n}').valid).toBe(false);
        });
    });

    describe('JsoncValidator', () => {
        const validator = new JsoncValidator();

        it('should accept comments and trailing commas', () => {
            const code = '{\n  // comment\n  "url": "http://localhost", /* c */\n  "list": [1, 2,],\n}';
            expect(validator.validate(code)).toEqual({ valid: true });
        });

        it('should still reject broken JSON', () => {
            expect(validator.validate('{ "a": }').valid).toBe(false);
        });

        it('should report unterminated block comments', () => {
            expect(validator.validate('{\n/* open')).toEqual({
                valid: false,
                message: 'Unterminated block comment',
                line: 2,
            });
        });
    });

    describe('stripJsonComments', () => {
        it('should blank comments and keep strings', () => {
            expect(stripJsonComments('{"a": "//not"} // x')).toBe('{"a": "//not"}     ');
        });

        it('should keep newlines inside block comments', () => {
            expect(stripJsonComments('/* a\nb */1')).toBe('    \n    1');
        });
    });

    describe('YamlValidator', () => {
        const validator = new YamlValidator();

        it('should accept multi-document YAML', () => {
            expect(validator.validate('a: 1\n---\nb: [x, y]\n')).toEqual({ valid: true });
        });

        it('should report the line of an indentation error', () => {
            const result = validator.validate('a: 1\n  b: 2\n');

            expect(result.valid).toBe(false);
            if (!result.valid) {
                expect(result.message).toContain('bad indentation');
                expect(result.line).toBe(2);
            }
        });
    });

    describe('XmlValidator', () => {
        const validator = new XmlValidator();

        it('should accept declarations, comments, CDATA and self-closing tags', () => {
            const code = [
                '<?xml version="1.0"?>',
                '<!-- comment <b> -->',
                '<Project Sdk="Microsoft.NET.Sdk">',
                '  <PropertyGroup>',
                '    <TargetFramework>net8.0</TargetFramework>',
                '    <Empty />',
                '  </PropertyGroup>',
                '  <![CDATA[ <raw> ]]>',
                '</Project>',
            ].join('\n');

            expect(validator.validate(code)).toEqual({ valid: true });
        });

        it('should accept > inside quoted attributes', () => {
            expect(validator.validate('<a title="x > y">t</a>')).toEqual({ valid: true });
        });

        it('should report mismatched closing tags', () => {
            expect(validator.validate('<Project>\n  <PropertyGroup>\n</Project>')).toEqual({
                valid: false,
                message: 'Expected </PropertyGroup> but found </Project>',
                line: 3,
            });
        });

        it('should report closing tags without an opening tag', () => {
            expect(validator.validate('</Project>')).toEqual({
                valid: false,
                message: 'Closing tag </Project> has no matching opening tag',
                line: 1,
            });
        });

        it('should report elements that are never closed', () => {
            expect(validator.validate('<ItemGroup>\n  <PackageReference Include="x" />')).toEqual({
                valid: false,
                message: 'Element <ItemGroup> is never closed',
                line: 1,
            });
        });

        it('should report unterminated tags and bad names', () => {
            expect(validator.validate('<Project\n')).toEqual({ valid: false, message: 'Unterminated tag', line: 1 });
            expect(validator.validate('< Project>')).toEqual({ valid: false, message: 'Invalid tag name', line: 1 });
        });

        it('should report unterminated comments', () => {
            expect(validator.validate('<a>\n<!-- x')).toEqual({
                valid: false,
                message: 'Unterminated comment, CDATA or declaration',
                line: 2,
            });
        });
    });

    describe('CSharpValidator', () => {
        const validator = new CSharpValidator();

        it('should skip strings, chars, comments and directives', () => {
            const code = [
                'using System;',
                '#region Setup',
                'public class Demo',
                '{',
                '    // not a brace: }',
                '    public string Path = @"C:\\docs\\";',
                '    public char Open = \'{\';',
                '    public string Json = """{"a": 1}""";',
                '    public string Escaped = "quote \\" (";',
                '    /* ( */',
                '}',
            ].join('\n');

            expect(validator.validate(code)).toEqual({ valid: true });
        });

        it('should report unclosed braces at the opener', () => {
            expect(validator.validate('public void Run()\n{\n    DoWork();\n')).toEqual({
                valid: false,
                message: "Unclosed '{'",
                line: 2,
            });
        });

        it('should report mismatched delimiters', () => {
            expect(validator.validate('Call(a, b};')).toEqual({
                valid: false,
                message: "Expected ')' but found '}'",
                line: 1,
            });
        });

        it('should report unexpected closers', () => {
            expect(validator.validate('var x = 1;\nx = 1);')).toEqual({
                valid: false,
                message: "Unexpected ')'",
                line: 2,
            });
        });

        it('should report unterminated strings', () => {
            expect(validator.validate('var s = "abc;\nvar t = 1;')).toEqual({
                valid: false,
                message: 'Unterminated string or character literal',
                line: 1,
            });
        });

        it('should report unterminated block comments', () => {
            expect(validator.validate('int a;\n/* open')).toEqual({
                valid: false,
                message: 'Unterminated block comment',
                line: 2,
            });
        });
    });

    describe('CodeValidatorRegistry', () => {
        it('should register the built-in languages', () => {
            expect(createDefaultValidatorRegistry().languages()).toEqual([
                'c#', 'cs', 'csharp', 'csproj', 'json', 'json5', 'jsonc', 'msbuild', 'xml', 'yaml', 'yml',
            ]);
        });

        it('should look up languages case-insensitively', () => {
            const registry = createDefaultValidatorRegistry();

            expect(registry.get('JSON')).toBeInstanceOf(JsonValidator);
            expect(registry.has('C#')).toBe(true);
            expect(registry.get('python')).toBeUndefined();
        });

        it('should reject duplicate registrations', () => {
            const registry = new CodeValidatorRegistry().register(new JsonValidator());

            expect(() => registry.register(new JsonValidator())).toThrow(ConfigurationError);
            expect(() => registry.register(new JsonValidator())).toThrow('A validator for "json" is already registered');
        });

        it('should replace validators when asked', () => {
            const custom = { languages: ['json'], validate: () => ({ valid: true as const }) };
            const registry = createDefaultValidatorRegistry().register(custom, true);

            expect(registry.get('json')).toBe(custom);
        });
    });
});
