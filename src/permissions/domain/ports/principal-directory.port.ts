/**
 * Identity lookup for the accounts a permission can be granted to
 */
export abstract class PrincipalDirectoryPort {
  abstract principalExists(
    principalName: string,
    principalHost: string,
  ): Promise<boolean>;
}
