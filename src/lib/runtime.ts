/**
 * Library version used in the default User-Agent header.
 * Keep in sync with package.json when releasing.
 */
export const VERSION = "0.1.0";

const PLATFORM_SUFFIX = `ghdispatch/${VERSION} node/${process.versions.node}`;

/**
 * Build a User-Agent string for an application talking to GitHub:
 * `name/version (url) ghdispatch/<version> node/<version>`.
 *
 * GitHub rejects requests without a User-Agent, and asks that it identify the
 * application making them.
 */
export function makeUserAgent(
	name: string,
	version: string,
	url?: string,
): string {
	let agent = `${name}/${version}`;
	if (url !== undefined) {
		agent += ` (${url})`;
	}
	return `${agent} ${PLATFORM_SUFFIX}`;
}

export const DEFAULT_USER_AGENT = PLATFORM_SUFFIX;
