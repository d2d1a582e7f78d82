export enum Phase {
  COME_OUT = 'COME_OUT',
  POINT_ON = 'POINT_ON',
}
