/** Inbound request from a requirer of the certificates relation. */
export interface CertificateCreationRequest {
  /** Relation id routing the published chain back to the requester */
  correlationId: string;
  /** PEM-encoded PKCS#10 request */
  certificateSigningRequest: string;
}

/**
 * Chain as written by the ACME client, leaf first.
 */
export interface CertificateChain {
  /** PEM blocks in file order (leaf to root) */
  blocks: string[];
  leaf: string;
  /** Last block of the file; equals `leaf` when the file holds a single block */
  ca: string;
  /** Root to leaf, the order published to requesters */
  chain: string[];
}

/** Data set on the relation for one request. */
export interface Publication {
  correlationId: string;
  certificateSigningRequest: string;
  certificate: string;
  ca: string;
  chain: string[];
}
