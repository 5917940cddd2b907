export * from './hmac-signature';
