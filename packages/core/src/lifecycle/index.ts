export {
  canTransition,
  reservationState,
  transition,
  type ReservationAction,
  type ReservationState,
} from "./state-machine.js";
