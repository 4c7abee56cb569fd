/**
 * Bridge module index file
 */
export * from './channels';
export * from './locations.bridge';
