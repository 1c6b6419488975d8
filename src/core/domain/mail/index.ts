export * from './branding';
export * from './mailRequest';
export * from './templateVariables';
