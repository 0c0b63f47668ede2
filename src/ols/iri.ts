const OBO_PURL = 'http://purl.obolibrary.org/obo/';

/** `GO:0008150` or `GO_0008150`; prefix letters, local part alphanumeric */
const COMPACT_ID = /^([A-Za-z][A-Za-z0-9.-]*)[:_]([A-Za-z0-9]+)$/;

/**
 * Turn a term reference into an IRI OLS accepts in its term paths.
 * Full IRIs pass through; OBO-style ids expand to their PURL.
 */
export function resolveTermIri(reference: string): string {
  const value = reference.trim();
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(value) || value.startsWith('urn:')) {
    return value;
  }
  const match = COMPACT_ID.exec(value);
  if (!match) return value;
  const [, prefix = '', local = ''] = match;
  // "hp:0000118" means HP; mixed-case prefixes such as NCBITaxon are kept
  const canonical = prefix === prefix.toLowerCase() ? prefix.toUpperCase() : prefix;
  return `${OBO_PURL}${canonical}_${local}`;
}
