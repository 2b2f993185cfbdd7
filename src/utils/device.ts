// Utility: Device labels for session listings

/**
 * Coarse device name from a User-Agent header
 */
export function describeDevice(userAgent?: string): string | undefined {
  if (!userAgent) {
    return undefined;
  }

  const ua = userAgent.toLowerCase();

  if (ua.includes('iphone')) return 'iPhone';
  if (ua.includes('ipad')) return 'iPad';
  if (ua.includes('android')) return 'Android';
  if (ua.includes('mobile')) return 'Mobile Device';

  // Edge and Chrome both carry "chrome"; check Edge first
  if (ua.includes('edg/') || ua.includes('edge')) return 'Edge';
  if (ua.includes('firefox')) return 'Firefox';
  if (ua.includes('chrome')) return 'Chrome';
  if (ua.includes('safari')) return 'Safari';

  return 'Desktop Browser';
}
