import { argsToTrees, type FromArgsOptions } from "../../core/cli"
import { toLoadedSource } from "../../core/source"
import { LeafForSequence, type LoadedSource, type SourceLoader } from "../../ports/source"

export type ArgsSourceOptions = FromArgsOptions & {
  /**
   * @default process.argv.slice(2)
   */
  args?: readonly string[]
}

export class ArgsSource implements SourceLoader {
  readonly name = "args"

  constructor(private readonly opts: ArgsSourceOptions = {}) {}

  async load(): Promise<LoadedSource> {
    const args = this.opts.args ?? process.argv.slice(2)

    return toLoadedSource(argsToTrees(args, this.opts), this.name, LeafForSequence.Valid)
  }
}
