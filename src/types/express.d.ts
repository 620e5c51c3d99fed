import type { AdminContext } from './auth';

declare module 'express-serve-static-core' {
  interface Locals {
    admin?: AdminContext;
    correlationId?: string;
  }
}
