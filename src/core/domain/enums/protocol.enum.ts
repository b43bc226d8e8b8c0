/**
 * Credential protocols understood by the engine
 */
export enum Protocol {
  /**
   * JWT-encoded verifiable credentials
   */
  AP2 = 'AP2',

  /**
   * Structured JSON authorization tokens issued by a PSP
   */
  ACP = 'ACP',
}

/**
 * Resolve a protocol tag case-insensitively, or null when unrecognized
 */
export function parseProtocol(tag: string): Protocol | null {
  switch (tag.trim().toUpperCase()) {
    case Protocol.AP2:
      return Protocol.AP2;
    case Protocol.ACP:
      return Protocol.ACP;
    default:
      return null;
  }
}
