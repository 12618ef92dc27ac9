export function isValidLatitude(value: number) {
  return Number.isFinite(value) && value >= -90 && value <= 90
}

export function isValidLongitude(value: number) {
  return Number.isFinite(value) && value >= -180 && value <= 180
}

export function roundedCoordinate(value: number): string {
  return value.toFixed(5)
}

export function latLngParam(latitude: number, longitude: number) {
  return `${roundedCoordinate(latitude)},${roundedCoordinate(longitude)}`
}
