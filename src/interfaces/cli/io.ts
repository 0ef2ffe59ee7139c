export type IO = {
  readStdin: () => Promise<string>
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export function createProcessIO(): IO {
  return {
    readStdin: async () => {
      const chunks: Buffer[] = []
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
      }
      return Buffer.concat(chunks).toString('utf8')
    },
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text)
  }
}
