/** Any readable line stream the wire parser can consume. */
export type LineSource = AsyncIterable<string>

/** Structural view of a WHATWG stream reader (e.g. a fetch response body). */
export interface ByteStreamReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>
  cancel(reason?: unknown): Promise<void>
  releaseLock(): void
}

export interface ByteStream {
  getReader(): ByteStreamReader
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line
}

/**
 * Splits byte or text chunks into lines. Chunk boundaries may fall anywhere,
 * including inside a multi-byte character. A trailing line without a newline
 * is still yielded.
 */
export async function* readLines(chunks: AsyncIterable<Uint8Array | string>): LineSource {
  const decoder = new TextDecoder()
  let buffer = ''

  for await (const chunk of chunks) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true })
    const lines = buffer.split('\n')
    buffer = lines.pop() ?? ''
    for (const line of lines) yield stripCarriageReturn(line)
  }

  buffer += decoder.decode()
  if (buffer.length > 0) yield stripCarriageReturn(buffer)
}

async function* readerChunks(stream: ByteStream): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader()
  let finished = false
  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) {
        finished = true
        return
      }
      if (value) yield value
    }
  } finally {
    // Consumer stopped early (done marker, cancel): drop the rest of the body.
    if (!finished) await reader.cancel().catch(() => undefined)
    reader.releaseLock()
  }
}

/** Lines of a fetch response body. */
export function readStreamLines(stream: ByteStream): LineSource {
  return readLines(readerChunks(stream))
}

/** In-memory line source, mostly for fixtures and replaying captured streams. */
export async function* linesOf(input: string | readonly string[]): LineSource {
  const lines = typeof input === 'string' ? input.split('\n').map(stripCarriageReturn) : input
  for (const line of lines) yield line
}
