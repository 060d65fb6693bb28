export type UrlParts = {
	scheme?: string;
	authority?: string;
	path: string;
	params?: string;
	query: string;
	fragment: string;
};

// scheme ":" "//" authority path "?" query "#" fragment, none of them required
const URL_SHAPE = /^(?:([A-Za-z][A-Za-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/;
const PERCENT_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

const decoder = new TextDecoder();

export function splitUrl(url: string): UrlParts {
	const match = URL_SHAPE.exec(url);
	if (!match) {
		// unreachable: every group is optional
		return { path: url, query: "", fragment: "" };
	}

	const [, rawScheme, authority, fullPath = "", query = "", fragment = ""] = match;
	const scheme = rawScheme?.toLowerCase();
	const lastSegment = fullPath.lastIndexOf("/") + 1;
	const paramsAt = fullPath.indexOf(";", lastSegment);

	if (paramsAt === -1) {
		return { scheme, authority, path: fullPath, query, fragment };
	}

	return {
		scheme,
		authority,
		path: fullPath.slice(0, paramsAt),
		params: fullPath.slice(paramsAt + 1),
		query,
		fragment,
	};
}

export function joinUrl(parts: UrlParts) {
	let url = "";
	if (parts.scheme !== undefined) url += `${parts.scheme}:`;
	if (parts.authority !== undefined) url += `//${parts.authority}`;
	url += parts.path;
	if (parts.params) url += `;${parts.params}`;
	if (parts.query) url += `?${parts.query}`;
	if (parts.fragment) url += `#${parts.fragment}`;
	return url;
}

/**
 * Decodes every run of `%XX` escapes as UTF-8. Malformed escapes are left as they are
 * and invalid byte sequences become U+FFFD, so this never throws the way
 * `decodeURIComponent` does.
 */
export function percentDecode(value: string) {
	return value.replace(PERCENT_RUN, (run) => {
		const bytes = new Uint8Array(run.length / 3);
		for (let i = 0; i < bytes.length; i++) {
			bytes[i] = Number.parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
		}
		return decoder.decode(bytes);
	});
}
