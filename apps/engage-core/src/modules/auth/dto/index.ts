export * from './login.dto';
export * from './signup.dto';
