/**
 * Codec lookup by file extension
 */

import { UnknownCodecError } from "../errors.js";
import { LzopCodec } from "./lzop.js";
import type { BlockCodec } from "./types.js";

export class CodecRegistry {
  #codecs: BlockCodec[] = [];

  register(codec: BlockCodec): this {
    this.#codecs.push(codec);
    return this;
  }

  /**
   * Find the codec whose extension ends `path`; the longest extension wins
   */
  resolve(path: string): BlockCodec | undefined {
    let best: { codec: BlockCodec; length: number } | undefined;

    for (const codec of this.#codecs) {
      for (const ext of codec.extensions) {
        if (path.endsWith(ext) && (!best || ext.length > best.length)) {
          best = { codec, length: ext.length };
        }
      }
    }

    return best?.codec;
  }

  /**
   * @throws UnknownCodecError if no codec handles `path`
   */
  require(path: string): BlockCodec {
    const codec = this.resolve(path);
    if (!codec) {
      throw new UnknownCodecError(path);
    }
    return codec;
  }
}

/**
 * Registry with every built-in codec
 */
export function createDefaultRegistry(): CodecRegistry {
  return new CodecRegistry().register(new LzopCodec());
}
