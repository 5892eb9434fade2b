import colors from "ansi-colors"
import type { StageStatus } from "../types"

const themeForStageStatus: colors.CustomTheme<StageStatus> = {
  started: colors.gray,
  passed: colors.green,
  failed: colors.red.bold
}

declare module "ansi-colors" {
  type CustomTheme<Keys extends string = string> = {
    [name in Keys]: StyleFunction
  }

  function theme (custom: CustomTheme): void;

  const started: StyleFunction
  const passed: StyleFunction
  const failed: StyleFunction
}

colors.theme({
  ...themeForStageStatus
})

export function stageLabel (status: StageStatus, text: string = status) {
  return colors[status](`[${text}]`)
}

export default colors
