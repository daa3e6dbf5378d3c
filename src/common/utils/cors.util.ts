export const isPrivateIpv4Host = (host: string): boolean => {
  if (!/^\d{1,3}(\.\d{1,3}){3}$/.test(host)) return false;
  const octets = host.split('.').map((s) => Number.parseInt(s, 10));
  if (octets.some((n) => Number.isNaN(n) || n < 0 || n > 255)) return false;
  return (
    octets[0] === 10 ||
    (octets[0] === 172 && octets[1] >= 16 && octets[1] <= 31) ||
    (octets[0] === 192 && octets[1] === 168)
  );
};

/**
 * Requests without an Origin (curl, server-to-server) always pass. Local
 * hosts pass on any port; private LAN hosts only outside production.
 */
export const isAllowedOrigin = (
  origin: string | undefined,
  allowedOrigins: string[],
  isProduction: boolean,
): boolean => {
  if (!origin) return true;
  if (allowedOrigins.includes(origin)) return true;

  let host: string;
  try {
    host = new URL(origin).hostname;
  } catch {
    return false;
  }
  if (host === 'localhost' || host === '127.0.0.1') return true;
  return !isProduction && isPrivateIpv4Host(host);
};
