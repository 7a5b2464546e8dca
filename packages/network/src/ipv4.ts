/**
 * IPv4 token grammar for command output.
 *
 * Digit grouping only: octet ranges are not checked, matching what the host
 * tooling itself accepts.
 */

const IPV4_TOKEN = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;
const IPV4_CIDR_TOKEN = /^(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})\/\d{1,2}$/;

/**
 * Split output into whitespace-delimited tokens
 */
export function tokenize(output: string): string[] {
  return output.split(/\s+/).filter(Boolean);
}

export function isIPv4(value: string): boolean {
  return IPV4_TOKEN.test(value);
}

/**
 * First token that is a dotted quad, e.g. from `hostname -I`
 */
export function findIPv4Token(output: string): string | null {
  for (const token of tokenize(output)) {
    if (IPV4_TOKEN.test(token)) {
      return token;
    }
  }
  return null;
}

/**
 * First `address/prefixlen` token with the prefix stripped, e.g. from `ip addr show`
 */
export function findIPv4CidrToken(output: string): string | null {
  for (const token of tokenize(output)) {
    const match = token.match(IPV4_CIDR_TOKEN);
    if (match) {
      return match[1];
    }
  }
  return null;
}
