import { applyDecorators, Post, HttpCode, HttpStatus, UseInterceptors } from '@nestjs/common';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';

/**
 * Hook endpoint decorator
 * POST route answering 200 on success, with the raw body preserved
 */
export function HookEndpoint(path: string) {
  return applyDecorators(
    Post(path),
    HttpCode(HttpStatus.OK),
    UseInterceptors(RawBodyInterceptor),
  );
}
