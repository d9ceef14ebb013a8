/**
 * Navigation URLs
 *
 * Navigation entries always address whole pages, relative to the site root.
 */

/**
 * Check whether a URL carries a scheme (e.g. "https://docs.example.com/").
 */
export function isAbsoluteUrl(url: string): boolean {
  return /^[a-z][a-z\d+.-]*:/i.test(url);
}

/**
 * Remove the fragment of a URL.
 *
 * @example
 * stripFragment("api/Foo.html#M_Bar") // => "api/Foo.html"
 */
export function stripFragment(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex >= 0 ? url.slice(0, hashIndex) : url;
}

/**
 * Convert a page address into a navigation URL: the fragment is removed and,
 * when the site has an absolute base URL, the address is made relative to it.
 *
 * @example
 * toNavigationUrl("https://docs.example.com/api/Foo.html#M_Bar", "https://docs.example.com/")
 * // => "api/Foo.html"
 */
export function toNavigationUrl(url: string, baseUrl = ""): string {
  const withoutFragment = stripFragment(url);
  if (!isAbsoluteUrl(baseUrl)) return withoutFragment;

  const root = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return withoutFragment.startsWith(root) ? withoutFragment.slice(root.length) : withoutFragment;
}
