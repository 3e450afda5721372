export interface RequestContext {
  ipAddress?: string;
  userAgent?: string;
}
