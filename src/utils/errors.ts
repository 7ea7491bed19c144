export class ClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 400
  ) {
    super(message);
    this.name = "ClientError";
  }
}

export class AuthError extends ClientError {
  constructor(message: string) {
    super(message, 401);
    this.name = "AuthError";
  }
}
