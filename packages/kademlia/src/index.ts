// XOR metric helpers for neighbour search over peer identifiers

export {
  bucketIndex,
  distance,
  hashToId,
  ID_BITS,
  leadingZeros,
  sortByDistance,
  xor,
  xorDistanceBigInt,
} from './xor'
