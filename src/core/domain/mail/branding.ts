/**
 * Project: Mail Dispatch Worker
 * File: src/core/domain/mail/branding.ts
 * Summary: Branding fields injected into every rendered template.
 */

import type { TemplateVariables } from './templateVariables';

export type BrandingConfig = Readonly<{
  appName: string;
  appOwner: string;
  contactEmail: string;
  logoUrl: string;
  primaryColor: string;
  primaryShadeColor: string;
  primaryForegroundColor: string;
}>;

export type BrandingConfigInput = {
  appName: string;
  appOwner: string;
  contactEmail: string;
  logoUrl?: string;
  primaryColor?: string;
  primaryShadeColor?: string;
  primaryForegroundColor?: string;
};

export const BRANDING_DEFAULTS = {
  logoUrl: '',
  primaryColor: '#2563eb',
  primaryShadeColor: '#1e40af',
  primaryForegroundColor: '#ffffff',
} as const;

// Template variable names for each branding field.
export const BRANDING_VARIABLE_KEYS = [
  'app_name',
  'app_owner',
  'contact_email',
  'logo_url',
  'primary_color',
  'primary_shade_color',
  'primary_foreground_color',
] as const;

export const createBrandingConfig = (input: BrandingConfigInput): BrandingConfig =>
  Object.freeze({
    appName: input.appName,
    appOwner: input.appOwner,
    contactEmail: input.contactEmail,
    logoUrl: input.logoUrl ?? BRANDING_DEFAULTS.logoUrl,
    primaryColor: input.primaryColor ?? BRANDING_DEFAULTS.primaryColor,
    primaryShadeColor: input.primaryShadeColor ?? BRANDING_DEFAULTS.primaryShadeColor,
    primaryForegroundColor:
      input.primaryForegroundColor ?? BRANDING_DEFAULTS.primaryForegroundColor,
  });

export const brandingToVariables = (branding: BrandingConfig): TemplateVariables => ({
  app_name: branding.appName,
  app_owner: branding.appOwner,
  contact_email: branding.contactEmail,
  logo_url: branding.logoUrl,
  primary_color: branding.primaryColor,
  primary_shade_color: branding.primaryShadeColor,
  primary_foreground_color: branding.primaryForegroundColor,
});
