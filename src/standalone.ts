// Injectables are compiled on first use outside an AOT build.
import '@angular/compiler';
import { Injector } from '@angular/core';
import { provideFirstResponse, type FirstResponseOptions } from './app.config';

/**
 * Root injector for hosts without an Angular application, such as a Node
 * process or a test.
 */
export function createFirstResponseInjector(options?: FirstResponseOptions): Injector {
  return Injector.create({ providers: provideFirstResponse(options), name: 'FirstResponse' });
}
