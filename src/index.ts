/**
 * acme-dns01-issuer
 *
 * Issues certificates for CSRs received from requirers by running lego through
 * a DNS-01 challenge with a pluggable DNS provider.
 */

export * from './lib/index.js';
