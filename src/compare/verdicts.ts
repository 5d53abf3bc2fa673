/** The closed set of comparison verdict messages. */
export const Verdict = {
  missingDist: "dist/ file(s) found in upstream but not rebuild",
  dsStore: ".DS_STORE file(s) found in upstream but not rebuild",
  lineEndings: "Excess CRLF line endings found in upstream",
  mismatchedFiles: "mismatched file(s) in upstream and rebuild",
  hiddenUpstreamOnly: "hidden file(s) found in upstream but not rebuild",
  upstreamOnly: "file(s) found in upstream but not rebuild",
  rebuildOnly: "file(s) found in rebuild but not upstream",
  packageJsonDiff: "package.json differences found",
  contentDiff: "content differences found",
  archiveMetadataDiff: "archive metadata differences found"
} as const;

export type VerdictMessage = (typeof Verdict)[keyof typeof Verdict];

const VERDICT_MESSAGES: ReadonlySet<string> = new Set(Object.values(Verdict));

export function isVerdictMessage(message: string): message is VerdictMessage {
  return VERDICT_MESSAGES.has(message);
}
