export { AppError, errorHandler } from "./errorHandler.js";
export { requestId } from "./requestId.js";
export { authGuard } from "./authGuard.js";
export { cspNonce, getCspNonce, nonceDirective } from "./cspNonce.js";
