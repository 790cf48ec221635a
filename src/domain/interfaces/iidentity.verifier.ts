export interface CallerIdentity {
  userId: string;
}

export interface IIdentityVerifier {
  verify(token: string): Promise<CallerIdentity>;
}
