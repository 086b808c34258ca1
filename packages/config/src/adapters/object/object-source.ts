import { fromJsonValue } from "../../core/json"
import { toLoadedSource } from "../../core/source"
import type { LoadedSource, SourceLoader } from "../../ports/source"

/**
 * In-memory values, e.g. overrides computed at startup. Nested objects and
 * arrays map to records and lists; scalars are stringified.
 */
export class ObjectSource implements SourceLoader {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<LoadedSource> {
    return toLoadedSource([fromJsonValue(this.obj)], this.name)
  }
}
