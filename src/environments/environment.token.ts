import { InjectionToken } from '@angular/core';
import { environment } from './environment';
import type { Environment } from './environment.types';

export const FIRST_RESPONSE_ENVIRONMENT = new InjectionToken<Environment>('FIRST_RESPONSE_ENVIRONMENT', {
  providedIn: 'root',
  factory: () => environment,
});
