export const API_KEY_HEADER_FORMAT = '<provider> <apiKey>';

export type ApiKeyAuthError =
  | {code: 'no_header'}
  | {code: 'invalid_format'; format: string; header: string}
  | {code: 'bad_provider'; provider: string; expected: string}
  | {code: 'invalid_key'; key: string; cause: Error};

export type ApiKeyAuthErrorCode = ApiKeyAuthError['code'];

export const describeApiKeyAuthError = (error: ApiKeyAuthError) => {
  switch (error.code) {
    case 'no_header':
      return 'no Authorization header provided';
    case 'invalid_format':
      return `provided Authorization header in invalid format, expecting: ${error.format} got: ${error.header}`;
    case 'bad_provider':
      return `Authorization provider does not match. Expecting: ${error.expected} got: ${error.provider}`;
    case 'invalid_key':
      return `provided api key: '${error.key}' is not valid: ${error.cause.message}`;
  }
};

export const toError = (value: unknown) => (value instanceof Error ? value : new Error(String(value)));
