import { describeIdGeneratorContract } from "../../ports/__tests__/id-generator.contract"
import { uuidV4 } from "../uuid"

describeIdGeneratorContract("uuidV4", () => uuidV4)
