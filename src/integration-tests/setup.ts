import "reflect-metadata";
import Container from "typedi";
import {MemoryOutputChannel, OutputChannelService} from "../output-channel.service";

// Every test starts with fresh services and logs captured in memory.
beforeEach(() => {
  Container.reset();
  Container.get(OutputChannelService).setupOutputChannel(new MemoryOutputChannel(), "debug");
});
