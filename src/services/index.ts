/**
 * Services exports for the Search Console gateway.
 */

export * from './oauthState';
export * from './user';
export * from './google';
export * from './credentials';
export * from './oauthFlow';
export * from './searchConsole';
