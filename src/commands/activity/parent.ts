import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "activity",
  description: "Inspect and maintain channel activity statistics",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
  defaultMemberPermissions: ["ManageChannels"],
})
@AutoLoad()
export default class ActivityParent extends Command {}
