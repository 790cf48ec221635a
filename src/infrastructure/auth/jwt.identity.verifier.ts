import jwt from "jsonwebtoken";
import { CallerIdentity, IIdentityVerifier } from "../../domain/interfaces/iidentity.verifier";
import { AuthenticationError } from "../../domain/errors/app.errors";

/**
 * Verifies HS256 bearer tokens issued by the identity provider.
 * The caller id comes from the `userId` claim, falling back to `sub`.
 */
export class JwtIdentityVerifier implements IIdentityVerifier {
  constructor(
    private readonly secret: string,
    private readonly algorithms: jwt.Algorithm[] = ["HS256"]
  ) {}

  async verify(token: string): Promise<CallerIdentity> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: this.algorithms });
    } catch (error) {
      // TokenExpiredError is a JsonWebTokenError, so it is checked first
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError("Token expired", { cause: error });
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new AuthenticationError("Invalid token", { cause: error });
      }
      throw new AuthenticationError("Authentication error", { cause: error });
    }

    if (typeof decoded === "string") {
      throw new AuthenticationError("Invalid token payload");
    }

    const userId = typeof decoded.userId === "string" && decoded.userId ? decoded.userId : decoded.sub;
    if (!userId) {
      throw new AuthenticationError("Invalid token payload");
    }

    return { userId };
  }
}
