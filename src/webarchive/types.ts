/** Main document of a webarchive, as stored in the archive. */
export interface WebArchiveResource {
  mimeType: string;
  /** IANA charset label from the archive, `UTF-8` when absent. */
  textEncoding: string;
  data: Uint8Array;
  /** Informational only. */
  url: string;
}
