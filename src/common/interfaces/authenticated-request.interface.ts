import { Request } from 'express';
import { AuthenticatedPrincipal } from '../../auth/shared/interfaces/identity.interface';

export interface AuthenticatedRequest extends Request {
  principal?: AuthenticatedPrincipal;
}
