import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import {
  CredentialProviderPort,
  SessionCredentialRequest,
} from '../../../application/ports/output/credential-provider.port';
import { AppConfig } from '../../../config/configuration';
import { SessionCredentialVO } from '../../../domain/value-objects/session-credential.vo';
import { AuthError, describeError } from '../../../domain/errors';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';

const exchangeResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
});

export function exchangeUrl(instance: string): string {
  return `https://${instance}.my.workfront.com/integrations/oauth2/api/v1/jwt/exchange`;
}

/**
 * Workfront Credential Provider Adapter
 * Signs an RS256 JWT assertion and exchanges it for an access token that
 * Workfront accepts as a session id.
 */
@Injectable()
export class WorkfrontCredentialProviderAdapter implements CredentialProviderPort {
  private readonly logger = new Logger(WorkfrontCredentialProviderAdapter.name);
  private readonly tokenTtlSeconds: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpClient: HttpClientService,
    configService: ConfigService<AppConfig, true>,
  ) {
    const auth = configService.get('auth', { infer: true });

    this.tokenTtlSeconds = auth.tokenTtlSeconds;
    this.timeoutMs = auth.timeoutMs;
  }

  async issueSessionCredential(request: SessionCredentialRequest): Promise<SessionCredentialVO> {
    this.assertComplete(request);

    const assertion = this.signAssertion(request);

    this.logger.log('Requesting Workfront OAuth session ID');

    let response: HttpResponse;
    try {
      response = await this.httpClient.postForm(
        exchangeUrl(request.identity.instance),
        {
          client_id: request.identity.clientId,
          client_secret: request.identity.clientSecret,
          jwt_token: assertion,
        },
        { timeout: this.timeoutMs },
      );
    } catch (error) {
      throw new AuthError(`Token exchange request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new AuthError(`Token exchange rejected with HTTP ${response.statusCode}`);
    }

    const parsed = exchangeResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new AuthError('Token exchange response did not contain an access token');
    }

    this.logger.log('Session ID retrieved successfully');
    return SessionCredentialVO.create(parsed.data.access_token, new Date(), parsed.data.expires_in);
  }

  private assertComplete(request: SessionCredentialRequest): void {
    const required: Record<string, string> = {
      instance: request.identity.instance,
      clientId: request.identity.clientId,
      clientSecret: request.identity.clientSecret,
      signingKey: request.signingKey,
      issuer: request.issuer,
      subject: request.subject,
    };

    const missing = Object.keys(required).filter((name) => !required[name]?.trim());
    if (missing.length > 0) {
      throw new AuthError(`Missing required identity values: ${missing.join(', ')}`);
    }
  }

  private signAssertion(request: SessionCredentialRequest): string {
    const now = Math.floor(Date.now() / 1000);

    try {
      return jwt.sign(
        {
          iss: request.issuer,
          sub: request.subject,
          exp: now + this.tokenTtlSeconds,
        },
        request.signingKey,
        { algorithm: 'RS256', noTimestamp: true },
      );
    } catch (error) {
      throw new AuthError(`Failed to sign JWT assertion: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
