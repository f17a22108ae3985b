import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { DatabaseFormatError } from "../model/errors.js";
import { MacroReference } from "../model/values.js";
import { parseBibtex, readBibFile, tryParseBibtex } from "../parser/index.js";

const bibtext = `This is an implicit comment.
@PREAMBLE{"This is the preamble."}

@ArtiCLe{ArticleKey,
    author = {Helmling, Michael J.},
    title  = {A bibtex database under revision control}
}
`;

describe("parseBibtex", () => {
	describe("basic document", () => {
		const document = parseBibtex(bibtext);

		it("captures leading text verbatim as one implicit comment", () => {
			expect(document.comments).toEqual([
				{ kind: "implicit", text: "This is an implicit comment.\n" },
			]);
		});

		it("keeps the preamble", () => {
			expect(document.preamble).toEqual({ value: "This is the preamble." });
		});

		it("lowercases the entry type and keeps the cite key", () => {
			expect([...document.keys()]).toEqual(["ArticleKey"]);
			expect(document.get("ArticleKey")?.entrytype).toBe("article");
		});

		it("parses author names and plain text fields", () => {
			const entry = document.get("ArticleKey");
			expect(entry?.get("author")).toEqual({
				kind: "names",
				names: [{ first: "Michael J.", last: "Helmling" }],
			});
			expect(entry?.get("title")).toBe("A bibtex database under revision control");
		});

		it("records the verbatim source of the entry", () => {
			const entry = document.get("ArticleKey");
			expect(entry?.source.startsWith("@ArtiCLe{ArticleKey,")).toBe(true);
			expect(entry?.source.endsWith("control}\n}")).toBe(true);
			expect(bibtext.slice(entry?.span.start, entry?.span.end)).toBe(entry?.source);
		});
	});

	it("keeps an undefined macro as a MacroReference", () => {
		const document = parseBibtex(
			"@ARTICLE{Key2011, author = {Smith, John}, title = {A Title}, journal = jrnl}",
		);
		expect(document.size).toBe(1);
		const entry = document.get("Key2011");
		expect(entry?.entrytype).toBe("article");
		expect(entry?.citekey).toBe("Key2011");
		expect(entry?.get("author")).toEqual({ kind: "names", names: [{ first: "John", last: "Smith" }] });
		expect(entry?.get("title")).toBe("A Title");
		expect(entry?.get("journal")).toEqual(new MacroReference("jrnl"));
	});

	it("joins concatenated text without separators", () => {
		const document = parseBibtex('@misc{K, title = "A" # {B} # "C", year = 2011}');
		expect(document.get("K")?.get("title")).toBe("ABC");
		expect(document.get("K")?.get("year")).toBe("2011");
	});

	it("keeps macro references distinct inside a concatenation", () => {
		const document = parseBibtex('@misc{K, note = "See " # Jrnl # {, p. 5}}');
		expect(document.get("K")?.get("note")).toEqual({
			kind: "concat",
			parts: ["See ", new MacroReference("jrnl"), ", p. 5"],
		});
	});

	it("indexes @string macros by lowercase key", () => {
		const document = parseBibtex(
			"@STRING{IEEE_J_IT = {IEEE Transactions on Information Theory}}\n@string(Short = \"S\")",
		);
		expect(document.macroDefinitions.get("ieee_j_it")).toEqual({
			key: "ieee_j_it",
			value: "IEEE Transactions on Information Theory",
		});
		expect(document.macroDefinitions.get("short")?.value).toBe("S");
	});

	it("accepts parentheses as entry brackets", () => {
		const document = parseBibtex("@misc(Key1, title = {X})");
		expect(document.get("Key1")?.get("title")).toBe("X");
	});

	it("accepts an entry without fields", () => {
		const document = parseBibtex("@misc{K}");
		expect(document.get("K")?.fields.size).toBe(0);
		expect(document.get("K")?.span).toEqual({ start: 0, end: 8 });
	});

	it("allows cite keys, but not field names, to start with a digit", () => {
		expect(parseBibtex("@misc{2011Key, title = {x}}").has("2011Key")).toBe(true);
		expect(() => parseBibtex("@misc{K, 1title = {x}}")).toThrow(DatabaseFormatError);
	});

	it("reads a quoted author field as plain text", () => {
		const document = parseBibtex('@misc{K, author = "Smith, John"}');
		expect(document.get("K")?.get("author")).toBe("Smith, John");
	});

	it("reads an empty author field as an empty string", () => {
		const document = parseBibtex("@misc{K, author = {}}");
		expect(document.get("K")?.get("author")).toBe("");
	});

	it("records explicit comments in order", () => {
		const document = parseBibtex(
			"@comment{jabref-meta: fileDirectory:docs;}\n@misc{K}\n@Comment{second}",
		);
		expect(document.comments).toEqual([
			{ kind: "explicit", text: "jabref-meta: fileDirectory:docs;" },
			{ kind: "explicit", text: "second" },
		]);
	});

	it("does not record whitespace before the first @ as a comment", () => {
		expect(parseBibtex("\n\n@misc{K}").comments).toEqual([]);
	});

	it("treats input without any @ as one implicit comment", () => {
		const document = parseBibtex("just some notes\n");
		expect(document.size).toBe(0);
		expect(document.comments).toEqual([{ kind: "implicit", text: "just some notes\n" }]);
	});

	it("keeps the last preamble", () => {
		const document = parseBibtex('@preamble{"one"}\n@preamble{"two"}');
		expect(document.preamble?.value).toBe("two");
	});

	it("parses the same source into equal documents", () => {
		expect(parseBibtex(bibtext)).toEqual(parseBibtex(bibtext));
	});

	describe("duplicate cite keys", () => {
		const source = "@misc{K, title={first}}\n@misc{J, title={middle}}\n@misc{K, title={second}}";

		it("overwrite keeps the later entry at the first position", () => {
			const document = parseBibtex(source);
			expect([...document.keys()]).toEqual(["K", "J"]);
			expect(document.get("K")?.get("title")).toBe("second");
		});

		it("keep-first ignores the later entry", () => {
			const document = parseBibtex(source, { duplicateKeys: "keep-first" });
			expect(document.get("K")?.get("title")).toBe("first");
		});

		it("error rejects the document", () => {
			expect(() => parseBibtex(source, { duplicateKeys: "error" })).toThrow(
				'Duplicate cite key "K"',
			);
		});
	});

	describe("strict and lenient modes", () => {
		const missingComma = "@article{Key,\n  title = {A}\n  year = 2011\n}";

		it("strict mode reports the furthest failure position", () => {
			expect(() => parseBibtex(missingComma)).toThrow(
				'Expected "#" or "," or "}" at line 3, column 3, found "year = 2011"',
			);
		});

		it("strict mode attaches the position to the error", () => {
			try {
				parseBibtex(missingComma);
				expect.unreachable();
			} catch (error) {
				expect(error).toBeInstanceOf(DatabaseFormatError);
				if (error instanceof DatabaseFormatError) {
					expect(error.position).toEqual({ offset: 30, line: 3, column: 3 });
				}
			}
		});

		it("lenient mode keeps what parsed before the failure", () => {
			const source = `@misc{A, title={x}}\n${missingComma}\n@misc{B}`;
			const document = parseBibtex(source, { mode: "lenient" });
			expect([...document.keys()]).toEqual(["A"]);
		});

		it("lenient mode stops at a construct nested deeper than maxDepth", () => {
			const source = "@misc{A}\n@misc{B, note = {{{{{{x}}}}}}}";
			const document = parseBibtex(source, { mode: "lenient", maxDepth: 3 });
			expect([...document.keys()]).toEqual(["A"]);
			expect(() => parseBibtex(source, { maxDepth: 3 })).toThrow(
				"Brace nesting deeper than 3 levels",
			);
		});

		it("strict mode rejects trailing text after the last entry", () => {
			expect(() => parseBibtex("@misc{K}\ntrailing words")).toThrow(DatabaseFormatError);
		});
	});

	it("rejects brace nesting deeper than maxDepth", () => {
		expect(() => parseBibtex("@misc{K, title={{{x}}}}", { maxDepth: 2 })).toThrow(
			"Brace nesting deeper than 2 levels",
		);
	});
});

describe("tryParseBibtex", () => {
	it("returns the document on success", () => {
		const result = tryParseBibtex("@misc{K}");
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.document.has("K")).toBe(true);
		}
	});

	it("returns a PARSE_ERROR for malformed input", () => {
		const result = tryParseBibtex("@misc{K, title = {unclosed}");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("PARSE_ERROR");
			expect(result.error.position?.line).toBe(1);
		}
	});
});

describe("readBibFile", () => {
	it("parses a database from disk", async () => {
		const dir = await mkdtemp(join(tmpdir(), "bib-"));
		try {
			const path = join(dir, "refs.bib");
			await writeFile(path, bibtext, "utf8");
			const document = await readBibFile(path);
			expect([...document.keys()]).toEqual(["ArticleKey"]);
			expect(document.preamble?.value).toBe("This is the preamble.");
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});
});
