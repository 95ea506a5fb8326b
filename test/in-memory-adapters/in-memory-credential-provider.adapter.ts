import { Injectable } from '@nestjs/common';
import { CredentialProviderPort, SessionCredentialRequest } from '../../src/application/ports/output';
import { AuthError, SessionCredentialVO } from '../../src/domain';

/**
 * In-Memory Credential Provider
 * Issues a fixed session token, or rejects when told to
 */
@Injectable()
export class InMemoryCredentialProvider implements CredentialProviderPort {
  readonly requests: SessionCredentialRequest[] = [];
  private rejection: string | null = null;

  constructor(private readonly token = 'test-session-id') {}

  reject(message: string): void {
    this.rejection = message;
  }

  async issueSessionCredential(request: SessionCredentialRequest): Promise<SessionCredentialVO> {
    this.requests.push(request);
    if (this.rejection) {
      throw new AuthError(this.rejection);
    }
    return SessionCredentialVO.create(this.token);
  }
}
