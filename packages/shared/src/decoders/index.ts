/**
 * @fileoverview Decoder exports
 *
 * - decode: DecodeResult, decodeValue, decodeString, decodeField
 * - photo: photoSchema, photoListSchema, Photo
 * - contact: nullable / optional fields and decodePartial
 * - todo: todoSchema, todoListSchema
 * - encode: encodePhoto, encodeTodos
 */

export * from "./decode.js";
export * from "./photo.js";
export * from "./contact.js";
export * from "./todo.js";
export * from "./encode.js";
