import type { ParseContext } from "./parse-context"

type Extractor<T> = (ctx: ParseContext) => T

/**
 * Consumes the children of a block by name so that nothing goes unread.
 *
 * Each `required`, `optional` and `repeated` call removes what it matched
 * from the pending children. `exhaust()` must come last: it fails on the
 * first child nobody asked for, so a misspelled directive is an error
 * instead of being ignored.
 *
 * @example
 * ```typescript
 * const block = BlockParser.from(ctx)
 * const key = block.required("key", (c) => c.arg(0).asStr())
 * const steps = block.repeated("step", (c) => c.name())
 * block.exhaust()
 * ```
 */
export class BlockParser {
  private pending: ParseContext[]
  private exhausted = false

  private constructor(
    private readonly ctx: ParseContext,
    children: ParseContext[],
  ) {
    this.pending = children
  }

  /**
   * `ctx` is either a block (document root, entered block) or a node with a
   * children block.
   */
  static from(ctx: ParseContext): BlockParser {
    return new BlockParser(ctx, ctx.nodes())
  }

  required<T>(name: string, extract: Extractor<T>): T {
    const found = this.take(name)

    if (found === undefined) {
      throw this.ctx.error(`Missing required directive '${name}'`, "missing_required")
    }

    return extract(found)
  }

  optional<T>(name: string, extract: Extractor<T>): T | undefined {
    const found = this.take(name)

    return found === undefined ? undefined : extract(found)
  }

  /** Every child named `name`, in source order. */
  repeated<T>(name: string, extract: Extractor<T>): T[] {
    this.ensureOpen()

    const matches = this.pending.filter((c) => c.name() === name)
    this.pending = this.pending.filter((c) => c.name() !== name)

    return matches.map((c) => extract(c))
  }

  /** Names of the children not consumed yet, in source order. */
  remaining(): string[] {
    return this.pending.map((c) => c.name())
  }

  exhaust(): void {
    this.ensureOpen()
    this.exhausted = true

    const leftover = this.pending[0]

    if (leftover !== undefined) {
      throw leftover.error(`Unknown directive: '${leftover.name()}'`, "unknown_directive")
    }
  }

  private take(name: string): ParseContext | undefined {
    this.ensureOpen()

    const index = this.pending.findIndex((c) => c.name() === name)

    if (index === -1) return undefined

    const [found] = this.pending.splice(index, 1)

    return found
  }

  private ensureOpen(): void {
    if (this.exhausted) {
      throw this.ctx.error("Block parser used after exhaust()", "structural")
    }
  }
}
