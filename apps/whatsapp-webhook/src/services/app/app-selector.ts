/**
 * Which App the gateway forwards messages to. Deployments either name the App
 * directly or hand over the selector object produced by an App picker.
 */
export type AppSelector =
  | { kind: 'bare'; value: string }
  | { kind: 'structured'; app_id?: string; id?: string };

/** Resolve a selector to a trimmed app id; absence means "no App, echo only". */
export function resolveAppId(selector: AppSelector | undefined): string | undefined {
  if (!selector) {
    return undefined;
  }

  const candidate =
    selector.kind === 'bare' ? selector.value : selector.app_id || selector.id;
  const appId = candidate?.trim();

  return appId ? appId : undefined;
}

/**
 * Parse the raw configuration value. JSON objects become structured
 * selectors, anything else is taken as a bare id.
 */
export function parseAppSelector(raw: string | undefined): AppSelector | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const trimmed = raw.trim();
  if (!trimmed.startsWith('{')) {
    return { kind: 'bare', value: trimmed };
  }

  const parsed: unknown = JSON.parse(trimmed);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('APP_SELECTOR must be an app id or a JSON object');
  }

  return {
    kind: 'structured',
    app_id: readString(parsed, 'app_id'),
    id: readString(parsed, 'id'),
  };
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}
