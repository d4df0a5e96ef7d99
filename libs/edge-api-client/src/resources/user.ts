import { tokenVerificationSchema, userSchema, type RequestOptions, type TokenVerification, type User } from '../types';
import { ApiResource } from './apiResource';

export class UserResource extends ApiResource {
  /** Checks the client's API token; throws when the server rejects it. */
  verifyToken(options?: RequestOptions): Promise<TokenVerification> {
    return this.request({ method: 'GET', path: 'user/tokens/verify', operation: 'user.verifyToken' }, tokenVerificationSchema, options);
  }

  get(options?: RequestOptions): Promise<User> {
    return this.request({ method: 'GET', path: 'user', operation: 'user.get' }, userSchema, options);
  }
}
