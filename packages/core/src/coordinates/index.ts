export {
  cartesianToSpherical,
  sphericalToCartesian,
  legacySphericalToCartesian,
  vectorsToDirections,
  directionsToVectors,
  directionToCartesian,
} from "./coordinates";
