import { SourceNotFoundError } from "../core/errors";
import { FileSource } from "./file-source";
import { JournalSource } from "./journal-source";
import type { LogSource, SourceFactory, SourceParams } from "./source";

/**
 * Name to factory mapping for log sources. Registering a name twice replaces
 * the earlier factory.
 */
export class SourceRegistry {
	private factories: Map<string, SourceFactory> = new Map();

	register(name: string, factory: SourceFactory): void {
		this.factories.set(name, factory);
	}

	has(name: string): boolean {
		return this.factories.has(name);
	}

	create(name: string, params: SourceParams = {}): LogSource {
		const factory = this.factories.get(name);
		if (!factory) {
			const available = this.list().join(", ") || "none";
			throw new SourceNotFoundError(
				`Unknown source: '${name}'. Available sources: ${available}`,
			);
		}
		return factory(params);
	}

	list(): string[] {
		return Array.from(this.factories.keys()).sort();
	}

	clear(): void {
		this.factories.clear();
	}
}

export function registerBuiltinSources(registry: SourceRegistry): void {
	registry.register("journalctl", (params) => new JournalSource(params));
	registry.register("file", (params) => new FileSource(params));
}
