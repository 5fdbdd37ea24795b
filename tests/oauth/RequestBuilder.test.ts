import {
  accessTokenToParam,
  appendAccessToken,
  appendQueryParams,
  authorizationUrl,
  buildAuthenticatedGet,
  buildAuthenticatedPost,
  buildPostRequest,
  buildRefreshRequest,
  buildTokenExchangeRequest,
  encodeForm,
  FORM_CONTENT_TYPE,
  toHttpRequest,
} from '../../src/oauth/RequestBuilder';
import { OAuth2Config } from '../../src/oauth/types';

const config: OAuth2Config = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  authorizeEndpoint: 'https://example.com/authorize',
  tokenEndpoint: 'https://example.com/token',
  redirectUri: 'https://app.example.com/callback',
};

const token = { accessToken: 'tok1' };

describe('encodeForm', () => {
  it('should join pairs in order and escape values', () => {
    expect(
      encodeForm([
        ['b', '2'],
        ['a', 'x y&z'],
      ])
    ).toBe('b=2&a=x+y%26z');
  });

  it('should encode an empty list as an empty string', () => {
    expect(encodeForm([])).toBe('');
  });
});

describe('appendQueryParams', () => {
  it('should start a query string', () => {
    expect(appendQueryParams('https://api.example.com/me', [['a', '1']])).toBe('https://api.example.com/me?a=1');
  });

  it('should extend an existing query string', () => {
    expect(appendQueryParams('https://api.example.com/me?fields=id', [['a', '1']])).toBe(
      'https://api.example.com/me?fields=id&a=1'
    );
  });

  it('should leave the URL alone without params', () => {
    expect(appendQueryParams('https://api.example.com/me', [])).toBe('https://api.example.com/me');
  });

  it('should not validate the URL', () => {
    expect(appendQueryParams('not a url', [['a', '1']])).toBe('not a url?a=1');
  });
});

describe('access token params', () => {
  it('should expose the token as access_token', () => {
    expect(accessTokenToParam(token)).toEqual([['access_token', 'tok1']]);
    expect(appendAccessToken('https://api.example.com/me', token)).toBe('https://api.example.com/me?access_token=tok1');
  });
});

describe('authorizationUrl', () => {
  it('should build the consent URL with extra params last', () => {
    expect(authorizationUrl(config, [['scope', 'email profile'], ['state', 's1']])).toBe(
      'https://example.com/authorize?client_id=test-client&response_type=code' +
        '&redirect_uri=https%3A%2F%2Fapp.example.com%2Fcallback&scope=email+profile&state=s1'
    );
  });

  it('should omit redirect_uri when not configured', () => {
    const { redirectUri: _redirectUri, ...withoutRedirect } = config;

    expect(authorizationUrl(withoutRedirect)).toBe(
      'https://example.com/authorize?client_id=test-client&response_type=code'
    );
  });
});

describe('buildTokenExchangeRequest', () => {
  it('should POST the code to the token endpoint', () => {
    expect(buildTokenExchangeRequest(config, 'abc123')).toEqual({
      method: 'POST',
      url: 'https://example.com/token',
      body: {
        kind: 'form',
        params: [
          ['client_id', 'test-client'],
          ['client_secret', 'test-secret'],
          ['code', 'abc123'],
          ['redirect_uri', 'https://app.example.com/callback'],
          ['grant_type', 'authorization_code'],
        ],
      },
    });
  });

  it('should target the token endpoint and carry the code for any code', () => {
    for (const code of ['a', 'code with spaces', 'x/y+z=']) {
      const spec = buildTokenExchangeRequest(config, code);

      expect(spec.url).toBe(config.tokenEndpoint);
      expect(spec.method).toBe('POST');
      expect(spec.body.kind === 'form' && spec.body.params).toContainEqual(['code', code]);
    }
  });

  it('should omit redirect_uri when not configured', () => {
    const { redirectUri: _redirectUri, ...withoutRedirect } = config;
    const spec = buildTokenExchangeRequest(withoutRedirect, 'abc123');

    expect(spec.body).toEqual({
      kind: 'form',
      params: [
        ['client_id', 'test-client'],
        ['client_secret', 'test-secret'],
        ['code', 'abc123'],
        ['grant_type', 'authorization_code'],
      ],
    });
  });
});

describe('buildRefreshRequest', () => {
  it('should POST the refresh token to the token endpoint', () => {
    expect(buildRefreshRequest(config, 'ref1')).toEqual({
      method: 'POST',
      url: 'https://example.com/token',
      body: {
        kind: 'form',
        params: [
          ['client_id', 'test-client'],
          ['client_secret', 'test-secret'],
          ['grant_type', 'refresh_token'],
          ['refresh_token', 'ref1'],
        ],
      },
    });
  });
});

describe('buildPostRequest', () => {
  it('should keep the caller params untouched', () => {
    expect(buildPostRequest('https://example.com/revoke', [['token', 't']])).toEqual({
      method: 'POST',
      url: 'https://example.com/revoke',
      body: { kind: 'form', params: [['token', 't']] },
    });
  });
});

describe('buildAuthenticatedGet', () => {
  it('should append the token to the query string', () => {
    expect(buildAuthenticatedGet(token, 'https://api.example.com/me?fields=id')).toEqual({
      method: 'GET',
      url: 'https://api.example.com/me?fields=id&access_token=tok1',
      body: { kind: 'empty' },
    });
  });
});

describe('buildAuthenticatedPost', () => {
  it('should append the token after the form params', () => {
    expect(buildAuthenticatedPost(token, 'https://api.example.com/posts', [['title', 'hi']], { kind: 'form' })).toEqual({
      method: 'POST',
      url: 'https://api.example.com/posts',
      body: {
        kind: 'form',
        params: [
          ['title', 'hi'],
          ['access_token', 'tok1'],
        ],
      },
    });
  });

  it('should move params and token into the query for a raw body', () => {
    const data = Buffer.from('{"title":"hi"}');

    expect(
      buildAuthenticatedPost(token, 'https://api.example.com/posts', [['draft', 'true']], { kind: 'raw', data })
    ).toEqual({
      method: 'POST',
      url: 'https://api.example.com/posts?draft=true&access_token=tok1',
      body: { kind: 'raw', data },
    });
  });
});

describe('toHttpRequest', () => {
  it('should form-encode the body after applying the policy headers', () => {
    const request = toHttpRequest(buildTokenExchangeRequest(config, 'abc123'), undefined, { timeout: 5000 });

    expect(request).toEqual({
      method: 'POST',
      url: 'https://example.com/token',
      timeout: 5000,
      headers: {
        'User-Agent': 'oauth2-http-client',
        Accept: 'application/json',
        'Content-Type': FORM_CONTENT_TYPE,
      },
      body:
        'client_id=test-client&client_secret=test-secret&code=abc123' +
        '&redirect_uri=https%3A%2F%2Fapp.example.com%2Fcallback&grant_type=authorization_code',
    });
  });

  it('should send a raw body with the JSON content type and bearer header', () => {
    const data = Buffer.from('{"title":"hi"}');
    const spec = buildAuthenticatedPost(token, 'https://api.example.com/posts', [], { kind: 'raw', data });

    const request = toHttpRequest(spec, token, { userAgent: 'my-app/1.0' });

    expect(request.headers).toEqual({
      Authorization: 'Bearer tok1',
      'User-Agent': 'my-app/1.0',
      Accept: 'application/json',
      'Content-Type': 'application/json',
    });
    expect(request.body).toBe(data);
    expect(request.url).toBe('https://api.example.com/posts?access_token=tok1');
    expect('timeout' in request).toBe(false);
  });

  it('should leave a GET without a body', () => {
    const request = toHttpRequest(buildAuthenticatedGet(token, 'https://api.example.com/me'), token);

    expect(request.body).toBeUndefined();
    expect(request.headers.Authorization).toBe('Bearer tok1');
  });
});
