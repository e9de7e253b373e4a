export class InvalidRouteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRouteError';
  }
}

export class RouteNotFoundError extends Error {
  constructor(readonly routeName: string, available: string[]) {
    super(`Route "${routeName}" not found on map (available: ${available.join(', ') || 'none'})`);
    this.name = 'RouteNotFoundError';
  }
}

export class AidStationNotFoundError extends Error {
  constructor(readonly aidStationName: string) {
    super(`No map marker found for aid station "${aidStationName}"`);
    this.name = 'AidStationNotFoundError';
  }
}
