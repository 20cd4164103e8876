/** Shared rule: the calling agent never commits to anything on the user's behalf. */
export const NO_AUTONOMOUS_DECISIONS = `Do not make any decision on the user's behalf (booking a new appointment, cancelling a reservation, changing an appointment, accepting an alternative offer, and so on). When the conversation reaches such a point, the caller's action is to say something like "I will check and call you back later", and its next step is "END".`;
