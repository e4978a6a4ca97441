import { promises as fs } from "node:fs";
import path from "node:path";
import { PersistenceError, createLogger, type Signal } from "@longwatch/core";
import { BaseSignalStore } from "./signalStore";
import { SIGNAL_FILE_VERSION, decodeSignalFile, type SignalFile } from "./signalCodec";

const logger = createLogger("persistence");

const isMissingFile = (err: unknown): boolean =>
	err instanceof Error && "code" in err && err.code === "ENOENT";

/**
 * Keeps every signal in one JSON document. Writes go to a temp file that is
 * renamed over the target, so readers never see a half-written file.
 */
export class JsonFileSignalStore extends BaseSignalStore {
	private writes = 0;

	constructor(private readonly filePath: string) {
		super();
	}

	protected async load(): Promise<Map<string, Signal>> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePath, "utf8");
		} catch (err) {
			if (isMissingFile(err)) {
				logger.info("signal_store_created", { path: this.filePath });
				return new Map();
			}
			throw new PersistenceError("load", err);
		}

		try {
			const signals = decodeSignalFile(raw);
			logger.info("signal_store_loaded", { path: this.filePath, signals: signals.length });
			return new Map(signals.map((signal) => [signal.id, signal]));
		} catch (err) {
			throw new PersistenceError("load", err);
		}
	}

	protected async persist(next: Map<string, Signal>): Promise<void> {
		const document: SignalFile = {
			version: SIGNAL_FILE_VERSION,
			signals: Array.from(next.values()),
		};
		this.writes += 1;
		const tempPath = `${this.filePath}.${process.pid}.${this.writes}.tmp`;
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		try {
			await fs.writeFile(tempPath, JSON.stringify(document, null, 2), "utf8");
			await fs.rename(tempPath, this.filePath);
		} catch (err) {
			await fs.rm(tempPath, { force: true });
			throw err;
		}
	}
}
