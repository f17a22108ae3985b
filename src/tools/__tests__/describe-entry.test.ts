import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describe, expect, it } from "vitest";
import { DocumentCache } from "../../cache/document-cache.js";
import { Journal, JournalsFile } from "../../model/journals.js";
import { registerDescribeEntryTool } from "../describe-entry.js";

type Args = { source: string; citekey: string; maxNames?: number };

function captureHandler(journals?: JournalsFile) {
	let capturedHandler: (args: Args) => Promise<unknown>;

	const mockServer = {
		registerTool: (_name: string, _schema: unknown, handler: (args: Args) => Promise<unknown>) => {
			capturedHandler = handler;
		},
	} as unknown as McpServer;

	registerDescribeEntryTool(mockServer, new DocumentCache(), {}, journals);

	// biome-ignore lint/style/noNonNullAssertion: handler is set synchronously in registerTool
	return capturedHandler!;
}

function parseEnvelope(result: unknown) {
	const content = (result as { content: Array<{ text: string }> }).content;
	return JSON.parse(content[0].text);
}

const SOURCE = `@string{mar = "March"}
@article{Helmling2014,
  author = {Helmling, Michael and van der Zalm, E. and Forney, Jr., David G. and Plato},
  title = {Decoding {LDPC} codes},
  journal = IT,
  month = mar,
  year = 2014,
  doi = {10.1000/xyz},
  file = {:papers/helmling.pdf:PDF}
}`;

const journals = new JournalsFile([
	new Journal("IT", "IEEE Trans. Inf. Theory", "IEEE Transactions on Information Theory"),
]);

describe("describe_entry tool", () => {
	it("summarizes an entry", async () => {
		const handler = captureHandler(journals);

		const envelope = parseEnvelope(await handler({ source: SOURCE, citekey: "Helmling2014" }));

		expect(envelope.valid).toBe(true);
		expect(envelope.metadata).toEqual({
			citekey: "Helmling2014",
			entrytype: "article",
			title: "Decoding LDPC codes",
			journal: "IEEE Trans. Inf. Theory",
			authors: "Helmling, van der Zalm, Forney Jr. et al.",
			editors: null,
			date: "March 2014",
			doiURL: "http://dx.doi.org/10.1000/xyz",
			filename: "papers/helmling.pdf",
		});
	});

	it("lists more authors when asked", async () => {
		const handler = captureHandler();

		const envelope = parseEnvelope(
			await handler({ source: SOURCE, citekey: "Helmling2014", maxNames: 4 }),
		);

		expect(envelope.metadata.authors).toBe("Helmling, van der Zalm, Forney Jr., Plato");
		expect(envelope.metadata.journal).toBe("it");
	});

	it("returns NOT_FOUND with the available keys", async () => {
		const handler = captureHandler();

		const envelope = parseEnvelope(await handler({ source: SOURCE, citekey: "missing" }));

		expect(envelope.valid).toBe(false);
		expect(envelope.error).toEqual({
			code: "NOT_FOUND",
			message: 'No entry with cite key "missing"',
			details: { citekeys: ["Helmling2014"] },
		});
	});

	it("returns FORMAT_ERROR for a malformed file field", async () => {
		const handler = captureHandler();

		const envelope = parseEnvelope(
			await handler({ source: "@misc{bad, file = {broken.pdf}}", citekey: "bad" }),
		);

		expect(envelope.error).toEqual({
			code: "FORMAT_ERROR",
			message: 'Wrong file URL format in entry "bad": broken.pdf',
		});
	});

	it("returns PARSE_ERROR for malformed input", async () => {
		const handler = captureHandler();

		const envelope = parseEnvelope(await handler({ source: "@misc{bad", citekey: "bad" }));

		expect(envelope.error.code).toBe("PARSE_ERROR");
	});
});
