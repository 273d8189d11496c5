export { Accessory } from './accessory.js';
export { Contact } from './contact.js';
export { Room } from './room.js';
export { Message } from './message.js';
export { Friendship } from './friendship.js';
export { RoomInvitation } from './room-invitation.js';
