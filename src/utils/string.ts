/**
 * Removes trailing characters from a string without using regex.
 *
 * This function iteratively checks each character from the end of the string
 * and removes any consecutive characters that match the specified characters to remove.
 *
 * @param {string} input - The string to process
 * @param {string[]} charactersToRemove - Array of characters to remove from the end
 * @returns {string} The input string with all trailing specified characters removed
 *
 * @example
 * // Returns "https://example.com/acme/widgets"
 * removeTrailingCharacters("https://example.com/acme/widgets//", ["/"])
 */
export function removeTrailingCharacters(input: string, charactersToRemove: string[]): string {
  let endIndex = input.length;
  while (endIndex > 0 && charactersToRemove.includes(input[endIndex - 1])) {
    endIndex--;
  }

  return input.slice(0, endIndex);
}

/**
 * Upper-cases the first character of a string and leaves the remainder unchanged.
 *
 * @example
 * // Returns "Add login button"
 * capitalizeFirstCharacter("add login button")
 */
export function capitalizeFirstCharacter(input: string): string {
  // Destructuring iterates by code point, keeping surrogate pairs together
  const [first = ''] = input;

  return first.toUpperCase() + input.slice(first.length);
}

/**
 * Renders a template string by replacing placeholders with provided values.
 *
 * @param template The template string containing placeholders in the format `{{key}}`.
 * @param variables An object where keys correspond to placeholder names and values are their replacements.
 * @returns The rendered string with placeholders replaced.
 *
 * @example
 * // Returns "## [v1.0.0] - 2024-01-01"
 * renderTemplate("## [{{version}}] - {{date}}", { version: "v1.0.0", date: "2024-01-01" })
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => {
    return key in variables ? variables[key] : placeholder;
  });
}

/**
 * Converts the output of `git remote get-url` into a browsable base URL for comparison and
 * release links.
 *
 * - Trailing whitespace, trailing slashes and the `.git` suffix are removed.
 * - scp-like (`git@host:owner/repo`) and `ssh://` remotes are rewritten to `https://host/owner/repo`.
 * - Credentials embedded in `http(s)` remotes are dropped.
 *
 * Anything else (e.g. a local path) only has its suffix removed.
 *
 * @example
 * // Returns "https://github.com/acme/widgets"
 * normalizeRemoteUrl("git@github.com:acme/widgets.git\n")
 */
export function normalizeRemoteUrl(remoteUrl: string): string {
  let url = remoteUrl.trim();

  const scpMatch = /^[\w.-]+@([^:/]+):(?!\/)(.+)$/.exec(url);
  if (scpMatch) {
    url = `https://${scpMatch[1]}/${scpMatch[2]}`;
  } else if (/^(ssh|https?):\/\//i.test(url)) {
    const { protocol, host, hostname, pathname } = new URL(url);
    // The ssh port says nothing about the web port, so only http(s) keeps it
    url = protocol === 'ssh:' ? `https://${hostname}${pathname}` : `${protocol}//${host}${pathname}`;
  }

  url = removeTrailingCharacters(url, ['/']);
  if (url.endsWith('.git')) {
    url = url.slice(0, -'.git'.length);
  }

  return url;
}
