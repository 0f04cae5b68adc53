export * from './update-profile.dto';
export * from './update-contact.dto';
export * from './user-response.dto';
