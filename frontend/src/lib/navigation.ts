export function redirectTo(url: string): void {
  console.log('[navigation] Redirecting to', url);
  window.location.assign(url);
}
