export { ConfigValidator } from './ConfigValidator';
