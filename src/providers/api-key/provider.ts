import type { IdCodec } from '../../core/id-codec.js';
import { getHeader } from '../../core/request.js';
import type {
  AuthRequest,
  AuthScheme,
  Principal,
  PrincipalId,
  PrincipalLookup,
} from '../../core/types.js';
import {
  AuthenticationError,
  InvalidIdentifierError,
  PrincipalNotFoundError,
} from '../../utils/errors.js';
import type { AuthProvider } from '../base.js';
import type { APIKeyService } from './service.js';

export const DEFAULT_API_KEY_HEADER = 'X-API-Key';

export interface APIKeyProviderOptions<ID extends PrincipalId> {
  /** Default: X-API-Key */
  headerName?: string;
  /** Resolves the key service for the current request (e.g. per-request DB session) */
  serviceFactory: (request: AuthRequest) => APIKeyService;
  idCodec: IdCodec<ID>;
}

/**
 * Authenticates requests carrying a raw API key in a custom header.
 */
export class APIKeyAuthProvider<ID extends PrincipalId> implements AuthProvider<ID> {
  readonly name = 'api_key';
  readonly scheme: AuthScheme;
  readonly headerName: string;

  private readonly serviceFactory: (request: AuthRequest) => APIKeyService;
  private readonly idCodec: IdCodec<ID>;

  constructor(options: APIKeyProviderOptions<ID>) {
    this.headerName = options.headerName ?? DEFAULT_API_KEY_HEADER;
    this.scheme = { type: 'apiKey', in: 'header', name: this.headerName };
    this.serviceFactory = options.serviceFactory;
    this.idCodec = options.idCodec;
  }

  /** Key service bound to `request` */
  getService(request: AuthRequest): APIKeyService {
    return this.serviceFactory(request);
  }

  canHandle(request: AuthRequest): boolean {
    const value = getHeader(request, this.headerName);
    return value !== undefined && value.trim() !== '';
  }

  async authenticate(
    request: AuthRequest,
    lookup: PrincipalLookup<ID>
  ): Promise<Principal<ID> | null> {
    const key = getHeader(request, this.headerName)?.trim();
    if (!key) {
      return null;
    }

    try {
      const { ownerId } = await this.getService(request).validateKey(key);
      const principal = await lookup.getById(this.idCodec.parse(ownerId));

      if (!principal.isActive) {
        console.warn('[APIKeyAuthProvider] API key presented for inactive principal', { ownerId });
        return null;
      }
      return principal;
    } catch (error) {
      if (
        error instanceof AuthenticationError ||
        error instanceof PrincipalNotFoundError ||
        error instanceof InvalidIdentifierError
      ) {
        return null;
      }
      throw error;
    }
  }
}
