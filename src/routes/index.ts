import { schemasRouter } from "./schemas.js";

export default { schemasRouter };
