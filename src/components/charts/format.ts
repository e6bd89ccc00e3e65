import { format } from "d3";

export const formatValue = format(",.2~f");
