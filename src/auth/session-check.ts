/** URL fragments that tell a signed-in application page from the sign-in flow */
export interface AuthMarkers {
  hostMarker: string;
  signInMarker: string;
}

export const DEFAULT_AUTH_MARKERS: AuthMarkers = {
  hostMarker: 'idx.google.com',
  signInMarker: 'signin'
};

/**
 * The one check for "signed in", applied after cookie load, after
 * interactive sign-in and at final verification.
 */
export function isAuthenticated(
  currentUrl: string,
  markers: AuthMarkers = DEFAULT_AUTH_MARKERS
): boolean {
  return currentUrl.includes(markers.hostMarker) && !currentUrl.includes(markers.signInMarker);
}
