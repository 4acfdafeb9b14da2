import { BaseError } from "@featurekit/errors"

export type AuthErrorCode = "unauthenticated"

export class AuthError extends BaseError<AuthErrorCode> {
  static unauthenticated(header: string): AuthError {
    return new AuthError(`Missing ${header} header`, {
      code: "unauthenticated",
      context: { header },
    })
  }
}
