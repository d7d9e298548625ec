import { Writable } from "node:stream";

/** Writable that collects everything written to it */
export function captureStream(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += String(chunk);
      cb();
    },
  });
  return { stream, output: () => buf };
}
