import { SessionCredentialVO } from '../../../domain/value-objects/session-credential.vo';

export const CREDENTIAL_PROVIDER_PORT = 'CredentialProviderPort';

/**
 * Session Credential Request
 */
export interface SessionCredentialRequest {
  identity: {
    instance: string;
    clientId: string;
    clientSecret: string;
  };
  signingKey: string;
  issuer: string;
  subject: string;
}

/**
 * Credential Provider Port (Driven Port)
 * Issues the short-lived credential that authorizes document downloads
 */
export interface CredentialProviderPort {
  /**
   * @throws AuthError when the identity is incomplete, signing fails or the exchange is rejected
   */
  issueSessionCredential(request: SessionCredentialRequest): Promise<SessionCredentialVO>;
}
