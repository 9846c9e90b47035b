/**
 * Token pair returned by login and refresh
 */
export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export type TokenType = 'access' | 'refresh';

/**
 * Acknowledgement body for operations without a resource to return
 */
export interface DetailResponse {
  detail: string;
}
