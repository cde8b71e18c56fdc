export {
  deg2rad,
  rad2deg,
  elevationToColatitude,
  colatitudeToElevation,
} from "./angles";
