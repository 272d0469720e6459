export { isInCooldown, hasMinRiseSince } from './reenable';
