import { randomInt } from "node:crypto";
import { createServer } from "node:net";

const PASSWORD_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const PASSWORD_LENGTH = 32;

/** Uniform draw from [A-Za-z] using the CSPRNG. */
export function randomPassword(length = PASSWORD_LENGTH): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return out;
}

/**
 * Ask the OS for a free loopback port, then release it. Nothing holds the
 * port afterwards, so another process can still claim it before the
 * container binds.
 */
export async function findFreePort(host = "127.0.0.1"): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.on("error", reject);
    server.listen(0, host, () => {
      const addr = server.address();
      if (addr && typeof addr === "object") {
        const port = addr.port;
        server.close((err) => (err ? reject(err) : resolve(port)));
      } else {
        server.close(() => reject(new Error("Failed to read assigned port")));
      }
    });
  });
}
