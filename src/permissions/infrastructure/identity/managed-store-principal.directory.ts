import { Injectable } from '@nestjs/common';
import { PrincipalAccountService } from '../../../managed-store/services/principal-account.service';
import { PrincipalDirectoryPort } from '../../domain/ports/principal-directory.port';

/**
 * Resolves principals against the managed store's own account catalog
 */
@Injectable()
export class ManagedStorePrincipalDirectory extends PrincipalDirectoryPort {
  constructor(private readonly principalAccounts: PrincipalAccountService) {
    super();
  }

  principalExists(principalName: string, principalHost: string): Promise<boolean> {
    return this.principalAccounts.principalExists(principalName, principalHost);
  }
}
