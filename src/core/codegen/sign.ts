/**
 * Signed Source Headers
 *
 * Every artifact starts with a `@generated` header carrying an md5 of the
 * file, so edits made by hand are detectable.
 *
 * @module
 */

import { calculateContentHash } from "../../utils/fs.js";

const SIGNATURE_PLACEHOLDER = "SignedSource<<__SIGNATURE__>>";
const SIGNATURE_PATTERN = /SignedSource<<([a-f0-9]{32})>>/;

function header(lines: readonly string[]): string {
  return ["/**", ...lines.map((line) => ` * ${line}`), ` * @generated ${SIGNATURE_PLACEHOLDER}`, " */"].join("\n");
}

/**
 * Prefixes `body` with the header and signs the result. The signature is the
 * md5 of the file with the placeholder in place of the signature.
 */
export function signSource(body: string, headerLines: readonly string[] = []): string {
  const unsigned = `${header(headerLines)}\n\n${body}`;
  return unsigned.replace(SIGNATURE_PLACEHOLDER, `SignedSource<<${calculateContentHash(unsigned)}>>`);
}

/**
 * Whether `content` carries a signature matching its text.
 */
export function isSignatureValid(content: string): boolean {
  const match = SIGNATURE_PATTERN.exec(content);
  if (!match?.[1]) return false;
  return calculateContentHash(content.replace(match[0], SIGNATURE_PLACEHOLDER)) === match[1];
}
