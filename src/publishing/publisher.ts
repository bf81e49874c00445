export interface Publisher {
  /**
   * Creates a published post. Resolves true only when the CMS confirms the
   * post was created; every failure resolves false and is logged, never thrown.
   */
  publish(title: string, body: string): Promise<boolean>;
}
