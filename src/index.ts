import { loadConfig } from "./config";
import { logger } from "./logger";
import { type JournalsFile, readJournalsFile } from "./model/journals";
import { createApp } from "./transport";

async function main(): Promise<void> {
	const config = loadConfig();
	let journals: JournalsFile | undefined;
	if (config.BIBTEX_JOURNALS_FILE) {
		journals = await readJournalsFile(config.BIBTEX_JOURNALS_FILE);
		logger.info("Loaded", journals.size, "journals from", config.BIBTEX_JOURNALS_FILE);
	}

	const app = createApp(config, journals);
	app.listen(config.PORT, () => {
		logger.info("bibkit MCP server listening on port", config.PORT);
	});
}

main().catch((error: unknown) => {
	logger.error("Failed to start:", error);
	process.exit(1);
});
