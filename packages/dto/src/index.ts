/**
 * Metro traffic DTO package public surface.
 * Re-exports stable enums, reason codes and wire types shared by the server and the client.
 */
export * from './enums';
export * from './reasons';
export * from './features';
