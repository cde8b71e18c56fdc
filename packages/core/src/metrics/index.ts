export { angleBetween, haversine, triangleArea } from "./angular";
