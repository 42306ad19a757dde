/**
 * Types Module
 *
 * Resume snapshot and stored record types shared by the store, the
 * generators and the HTTP API.
 */

export * from './resume';
